import "reflect-metadata";
import { NestFactory } from "@nestjs/core";
import { CONSOLE_SETTINGS, type ConsoleSettings } from "@foundry-console/config";
import { LoggerService } from "@foundry-console/io";
import { ApiModule } from "./api.module";
import { findConfigurationError } from "./bootstrap-errors";
import { applyCorsConfig } from "./cors";
import { HttpLoggerMiddleware } from "./middleware/http-logger.middleware";
import { configureOpenApi } from "./openapi-config";

export async function bootstrap(): Promise<void> {
  const app = await NestFactory.create(ApiModule, {
    bufferLogs: true,
    abortOnError: false,
  });
  app.enableShutdownHooks();

  const settings = app.get<ConsoleSettings>(CONSOLE_SETTINGS);
  const loggerService = app.get(LoggerService);

  applyCorsConfig(app, settings.api.cors);
  app.flushLogs();

  configureOpenApi(app);

  const httpLogger = app.get(HttpLoggerMiddleware);
  app.use(httpLogger.use.bind(httpLogger));

  const { port, host } = settings.api;
  await app.listen(port, host);
  loggerService
    .getLogger("bootstrap")
    .info({ port, host, endpoint: settings.projectEndpoint }, "Console API listening");
}

async function main(): Promise<void> {
  try {
    await bootstrap();
  } catch (error) {
    const logger = new LoggerService().getLogger("bootstrap");
    const configurationError = findConfigurationError(error);
    if (configurationError) {
      logger.fatal({ keys: configurationError.keys }, configurationError.message);
    } else {
      logger.fatal({ error }, "Console API failed to start");
    }
    process.exitCode = 1;
  }
}

void main();
