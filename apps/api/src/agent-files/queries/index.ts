import { ListAgentFilesHandler } from "./list-agent-files.handler";

export { ListAgentFilesHandler } from "./list-agent-files.handler";
export { ListAgentFilesQuery } from "./list-agent-files.query";

export const agentFileQueryHandlers = [ListAgentFilesHandler] as const;
