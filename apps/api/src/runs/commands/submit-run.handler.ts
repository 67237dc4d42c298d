import { CommandHandler, type ICommandHandler } from "@nestjs/cqrs";
import type { RunResult } from "@foundry-console/types";
import { RunsService } from "../runs.service";
import { SubmitRunCommand } from "./submit-run.command";

@CommandHandler(SubmitRunCommand)
export class SubmitRunHandler implements ICommandHandler<SubmitRunCommand, RunResult> {
  constructor(private readonly runs: RunsService) {}

  async execute({ session, request, signal }: SubmitRunCommand): Promise<RunResult> {
    return this.runs.submit(session, request, signal);
  }
}
