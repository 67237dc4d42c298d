import { DeleteAgentFileHandler } from "./delete-agent-file.handler";
import { UploadAgentFileHandler } from "./upload-agent-file.handler";

export { DeleteAgentFileCommand } from "./delete-agent-file.command";
export { DeleteAgentFileHandler } from "./delete-agent-file.handler";
export { UploadAgentFileCommand } from "./upload-agent-file.command";
export { UploadAgentFileHandler } from "./upload-agent-file.handler";

export const agentFileCommandHandlers = [
  UploadAgentFileHandler,
  DeleteAgentFileHandler,
] as const;
