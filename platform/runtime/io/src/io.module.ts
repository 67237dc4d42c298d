import { Global, Module, type DynamicModule } from "@nestjs/common";
import type { Provider } from "@nestjs/common";
import { CONSOLE_SETTINGS, type ConsoleSettings } from "@foundry-console/config";
import { LoggerService } from "./logger.service";
import { createLoggerProvider, createLoggerProviders } from "./logger.decorator";

export const createLoggerService = (settings?: ConsoleSettings): LoggerService => {
  const service = new LoggerService();
  service.configure(settings?.logging);
  return service;
};

export const loggerServiceProvider: Provider = {
  provide: LoggerService,
  inject: [ { token: CONSOLE_SETTINGS, optional: true } ],
  useFactory: createLoggerService,
};

const providers: Provider[] = [ loggerServiceProvider, createLoggerProvider() ];

@Global()
@Module({
  providers,
  exports: [ LoggerService, createLoggerProvider().provide ],
})
export class IoModule {
  /**
   * Registers every scoped logger requested with `@InjectLogger(scope)`.
   * Call it from the root module after the feature modules are imported so
   * their decorators have already run.
   */
  static forRoot(): DynamicModule {
    const scoped = createLoggerProviders();
    return {
      module: IoModule,
      global: true,
      providers: scoped,
      exports: scoped.map((provider) => provider.provide),
    };
  }
}
