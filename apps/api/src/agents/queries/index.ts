import { ListAgentsHandler } from "./list-agents.handler";

export { ListAgentsHandler } from "./list-agents.handler";
export { ListAgentsQuery } from "./list-agents.query";

export const agentQueryHandlers = [ListAgentsHandler] as const;
