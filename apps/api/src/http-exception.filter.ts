import {
  Catch,
  HttpException,
  HttpStatus,
  Inject,
  Injectable,
  type ArgumentsHost,
  type ExceptionFilter,
} from "@nestjs/common";
import { CONSOLE_SETTINGS } from "@foundry-console/config";
import type { ConsoleSettings } from "@foundry-console/config";
import { InjectLogger } from "@foundry-console/io";
import type { ApiErrorPayload } from "@foundry-console/types";
import type { Request, Response } from "express";
import type { Logger } from "pino";
import { FoundryError, FoundryRequestError } from "./foundry/foundry.errors";
import { RunPollAbortedError, RunPollTimeoutError } from "./runs/run-poller";

interface ResolvedException {
  status: number;
  message: string | string[];
  details?: Record<string, unknown>;
}

const ENVELOPE_KEYS = new Set(["message", "statusCode", "error"]);

export function resolveException(exception: unknown): ResolvedException {
  if (exception instanceof HttpException) {
    const status = exception.getStatus();
    const body = exception.getResponse();
    if (typeof body === "string") {
      return { status, message: body };
    }

    const rawMessage = "message" in body ? body.message : undefined;
    const rest = Object.fromEntries(
      Object.entries(body).filter(([key]) => !ENVELOPE_KEYS.has(key)),
    );
    return {
      status,
      message:
        typeof rawMessage === "string" || Array.isArray(rawMessage)
          ? rawMessage
          : exception.message,
      ...(Object.keys(rest).length > 0 ? { details: rest } : {}),
    };
  }

  if (exception instanceof RunPollTimeoutError) {
    return {
      status: HttpStatus.GATEWAY_TIMEOUT,
      message: exception.message,
      details: { runId: exception.runId, lastStatus: exception.lastStatus },
    };
  }

  if (exception instanceof FoundryError) {
    return {
      status: HttpStatus.BAD_GATEWAY,
      message: exception.message,
      details:
        exception instanceof FoundryRequestError
          ? { upstreamStatus: exception.status }
          : {},
    };
  }

  return { status: HttpStatus.INTERNAL_SERVER_ERROR, message: "Internal server error" };
}

@Catch()
@Injectable()
export class ApiHttpExceptionFilter implements ExceptionFilter {
  private readonly includeStackInResponse: boolean;

  constructor(
    @Inject(CONSOLE_SETTINGS) settings: ConsoleSettings,
    @InjectLogger("api:exceptions") private readonly logger: Logger,
  ) {
    this.includeStackInResponse = settings.api.exposeErrorStack;
  }

  catch(exception: unknown, host: ArgumentsHost): void {
    if (host.getType() !== "http") {
      throw exception;
    }

    const ctx = host.switchToHttp();
    const response = ctx.getResponse<Response>();
    const request = ctx.getRequest<Request>();
    const path = request.originalUrl ?? request.url;

    if (exception instanceof RunPollAbortedError) {
      this.logger.info(
        { method: request.method, path, runId: exception.runId },
        "Client disconnected while the run was polled",
      );
      return;
    }

    const { status, message, details } = resolveException(exception);

    const payload: ApiErrorPayload = {
      statusCode: status,
      timestamp: new Date().toISOString(),
      path,
      message,
    };

    if (details) {
      payload.details = details;
    }

    if (this.includeStackInResponse && exception instanceof Error) {
      payload.stack = exception.stack?.split("\n");
    }

    const logPayload = {
      statusCode: status,
      method: request.method,
      path,
      message,
      error:
        exception instanceof Error
          ? {
            name: exception.name,
            message: exception.message,
            stack: exception.stack,
          }
          : exception,
    };
    if (status >= HttpStatus.INTERNAL_SERVER_ERROR) {
      this.logger.error(logPayload, "Request failed");
    } else {
      this.logger.warn(logPayload, "Request rejected");
    }

    if (response.headersSent) {
      return;
    }
    response.status(status).json(payload);
  }
}
