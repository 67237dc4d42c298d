import {
  Module,
  type MiddlewareConsumer,
  type NestModule,
} from "@nestjs/common";
import { APP_FILTER, APP_PIPE } from "@nestjs/core";
import { ConfigModule } from "@foundry-console/config";
import { IoModule } from "@foundry-console/io";
import { HealthController } from "./controllers/health.controller";
import { HttpLoggerMiddleware } from "./middleware/http-logger.middleware";
import { ApiValidationPipe } from "./validation.pipe";
import { ApiHttpExceptionFilter } from "./http-exception.filter";
import { FoundryModule } from "./foundry/foundry.module";
import { SessionsModule } from "./sessions/sessions.module";
import { SessionMiddleware } from "./sessions/session.middleware";
import { SessionController } from "./sessions/session.controller";
import { AgentsModule } from "./agents/agents.module";
import { AgentsController } from "./agents/agents.controller";
import { AgentFilesModule } from "./agent-files/agent-files.module";
import { AgentFilesController } from "./agent-files/agent-files.controller";
import { ThreadsModule } from "./threads/threads.module";
import { ThreadsController } from "./threads/threads.controller";
import { RunsModule } from "./runs/runs.module";
import { RunsController } from "./runs/runs.controller";

export const SESSION_SCOPED_CONTROLLERS = [
  AgentsController,
  AgentFilesController,
  ThreadsController,
  RunsController,
  SessionController,
] as const;

@Module({
  imports: [
    ConfigModule.forRoot(),
    FoundryModule,
    SessionsModule,
    AgentsModule,
    AgentFilesModule,
    ThreadsModule,
    RunsModule,
    // Last, so every feature's @InjectLogger scope is registered.
    IoModule.forRoot(),
  ],
  controllers: [HealthController],
  providers: [
    HttpLoggerMiddleware,
    ApiValidationPipe,
    ApiHttpExceptionFilter,
    {
      provide: APP_PIPE,
      useExisting: ApiValidationPipe,
    },
    {
      provide: APP_FILTER,
      useExisting: ApiHttpExceptionFilter,
    },
  ],
})
export class ApiModule implements NestModule {
  configure(consumer: MiddlewareConsumer): void {
    consumer.apply(SessionMiddleware).forRoutes(...SESSION_SCOPED_CONTROLLERS);
  }
}
