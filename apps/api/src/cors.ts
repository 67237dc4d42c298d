import type { INestApplication } from "@nestjs/common";
import type { CorsOptions } from "@nestjs/common/interfaces/external/cors-options.interface";
import type { ApiCorsSettings } from "@foundry-console/config";
import { SESSION_HEADER } from "@foundry-console/types";

export function resolveCorsOptions(cors: ApiCorsSettings): CorsOptions {
  return {
    origin: cors.origin,
    credentials: false,
    allowedHeaders: ["Content-Type", "Accept", SESSION_HEADER],
    exposedHeaders: [SESSION_HEADER],
  };
}

export function applyCorsConfig(
  app: INestApplication,
  cors: ApiCorsSettings
): void {
  app.enableCors(resolveCorsOptions(cors));
}
