import { Module } from "@nestjs/common";
import { CqrsModule } from "@nestjs/cqrs";
import { runCommandHandlers } from "./commands";
import { defaultSleep, RUN_SLEEP, RunPoller } from "./run-poller";
import { RunsController } from "./runs.controller";
import { RunsService } from "./runs.service";

@Module({
  imports: [CqrsModule],
  providers: [
    { provide: RUN_SLEEP, useValue: defaultSleep },
    RunPoller,
    RunsService,
    ...runCommandHandlers,
  ],
  controllers: [RunsController],
})
export class RunsModule {}
