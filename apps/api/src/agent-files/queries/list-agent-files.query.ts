import type { IQuery } from "@nestjs/cqrs";

export class ListAgentFilesQuery implements IQuery {
  constructor(public readonly agentId: string) {}
}
