import { Module } from "@nestjs/common";
import { CqrsModule } from "@nestjs/cqrs";
import { threadCommandHandlers } from "./commands";
import { ThreadsController } from "./threads.controller";
import { ThreadsService } from "./threads.service";

@Module({
  imports: [CqrsModule],
  providers: [ThreadsService, ...threadCommandHandlers],
  controllers: [ThreadsController],
})
export class ThreadsModule {}
