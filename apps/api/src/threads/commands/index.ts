import { CreateThreadHandler } from "./create-thread.handler";

export { CreateThreadCommand } from "./create-thread.command";
export { CreateThreadHandler } from "./create-thread.handler";

export const threadCommandHandlers = [CreateThreadHandler] as const;
