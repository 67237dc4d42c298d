import { CommandHandler, type ICommandHandler } from "@nestjs/cqrs";
import type { ThreadSummary } from "@foundry-console/types";
import { ThreadsService } from "../threads.service";
import { CreateThreadCommand } from "./create-thread.command";

@CommandHandler(CreateThreadCommand)
export class CreateThreadHandler implements ICommandHandler<CreateThreadCommand, ThreadSummary> {
  constructor(private readonly threads: ThreadsService) {}

  async execute({ session }: CreateThreadCommand): Promise<ThreadSummary> {
    return this.threads.startThread(session);
  }
}
