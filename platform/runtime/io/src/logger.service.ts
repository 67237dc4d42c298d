import { Injectable } from "@nestjs/common";
import fs from "fs";
import path from "path";
import pino, { type DestinationStream, type Logger, type LoggerOptions } from "pino";
import type { LoggingConfig, LoggingDestination } from "@foundry-console/config";

/** Fields that may carry bearer tokens or credentials. */
export const REDACTED_LOG_PATHS = [
  "token",
  "*.token",
  "headers.authorization",
  "headers.Authorization",
  "*.headers.authorization",
  "*.headers.Authorization",
];

@Injectable()
export class LoggerService {
  private rootLogger: Logger | null = null;
  private cachedSignature = "";

  configure(config?: LoggingConfig): Logger {
    const signature = this.computeSignature(config);
    if (this.rootLogger && signature === this.cachedSignature) {
      return this.rootLogger;
    }
    this.rootLogger = this.buildLogger(config);
    this.cachedSignature = signature;
    return this.rootLogger;
  }

  getLogger(scope?: string): Logger {
    if (!this.rootLogger) {
      this.rootLogger = this.buildLogger();
    }
    if (!scope) {
      return this.rootLogger;
    }
    return this.rootLogger.child({ scope });
  }

  private computeSignature(config?: LoggingConfig): string {
    return JSON.stringify(config ?? {});
  }

  private resolvePrettyTransport(config?: LoggingConfig): LoggerOptions["transport"] {
    if (config?.destination) return undefined;
    const wantsPretty = config?.pretty ?? process.stdout.isTTY === true;
    if (!wantsPretty) return undefined;

    try {
      require.resolve("pino-pretty");
      return {
        target: "pino-pretty",
        options: {
          colorize: true,
          translateTime: "HH:MM:ss",
          ignore: "pid,hostname",
        },
      };
    } catch {
      return undefined;
    }
  }

  private prepareDestination(destination?: LoggingDestination): DestinationStream | undefined {
    if (!destination) return undefined;

    const filePath = path.resolve(destination.path);
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    return pino.destination({ dest: filePath, sync: false });
  }

  private buildLogger(config?: LoggingConfig): Logger {
    const destination = config?.destination;
    const options: LoggerOptions = {
      level: config?.level ?? "info",
      base: undefined,
      redact: { paths: REDACTED_LOG_PATHS, censor: "[REDACTED]" },
      timestamp: pino.stdTimeFunctions.isoTime,
    };

    const transport = this.resolvePrettyTransport(config);
    if (transport) {
      options.transport = transport;
    }

    const destStream = transport ? undefined : this.prepareDestination(destination);
    return destStream ? pino(options, destStream) : pino(options);
  }
}
