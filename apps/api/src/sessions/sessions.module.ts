import { Global, Module } from "@nestjs/common";
import { CqrsModule } from "@nestjs/cqrs";
import { sessionQueryHandlers } from "./queries";
import { SessionController } from "./session.controller";
import { SessionMiddleware } from "./session.middleware";
import { SessionStore } from "./session.store";

@Global()
@Module({
  imports: [CqrsModule],
  providers: [SessionStore, SessionMiddleware, ...sessionQueryHandlers],
  controllers: [SessionController],
  exports: [SessionStore, SessionMiddleware],
})
export class SessionsModule {}
