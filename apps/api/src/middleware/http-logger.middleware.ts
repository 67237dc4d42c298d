import { Injectable, NestMiddleware } from '@nestjs/common';
import type { Request, Response, NextFunction } from 'express';
import onFinished from 'on-finished';
import { InjectLogger } from '@foundry-console/io';
import { SESSION_HEADER } from '@foundry-console/types';
import type { Logger } from 'pino';

@Injectable()
export class HttpLoggerMiddleware implements NestMiddleware {
  constructor(@InjectLogger('http') private readonly logger: Logger) {}

  use(req: Request, res: Response, next: NextFunction): void {
    const startNs = process.hrtime.bigint();

    onFinished(res, () => {
      const durationNs = process.hrtime.bigint() - startNs;

      // Truncate to the nearest microsecond
      const durationUs = durationNs / 1_000n;
      const durationMs = Number(durationUs) / 1_000;

      const contentLength = this.resolveContentLength(res.getHeader('content-length'));
      const sessionId = res.getHeader(SESSION_HEADER);

      const payload = {
        method: req.method,
        url: req.originalUrl ?? req.url,
        statusCode: res.statusCode,
        ...(contentLength === undefined ? {} : { contentLength }),
        durationMs,
        ...(typeof sessionId === 'string' ? { sessionId } : {}),
        userAgent: req.get('user-agent'),
        ip: this.resolveIp(req),
      };

      this.logger.info(payload, 'HTTP request completed');
    });

    next();
  }

  private resolveContentLength(
    raw: number | string | string[] | undefined,
  ): number | string | undefined {
    if (typeof raw === 'number' || raw === undefined) {
      return raw;
    }
    const value = Array.isArray(raw) ? raw[0] : raw;
    const numeric = Number(value);
    return Number.isNaN(numeric) ? value : numeric;
  }

  private resolveIp(req: Request): string | undefined {
    const direct = this.normalizeIpCandidate(req.ip);
    if (direct) {
      return direct;
    }

    const forwardedHeader = req.headers['x-forwarded-for'];
    const forwardedValue = Array.isArray(forwardedHeader)
      ? forwardedHeader[0]
      : forwardedHeader;
    const forwarded = this.normalizeIpCandidate(forwardedValue?.split(',')[0]);
    if (forwarded) {
      return forwarded;
    }

    return this.normalizeIpCandidate(req.socket?.remoteAddress);
  }

  private normalizeIpCandidate(value: unknown): string | undefined {
    if (typeof value !== 'string') {
      return undefined;
    }

    const trimmed = value.trim();
    return trimmed.length > 0 ? trimmed : undefined;
  }
}
