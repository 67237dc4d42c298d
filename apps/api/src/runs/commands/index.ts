import { SubmitRunHandler } from "./submit-run.handler";

export { SubmitRunCommand } from "./submit-run.command";
export { SubmitRunHandler } from "./submit-run.handler";

export const runCommandHandlers = [SubmitRunHandler] as const;
