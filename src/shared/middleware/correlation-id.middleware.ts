import { randomUUID } from 'crypto';
import { NextFunction, Request, Response } from 'express';
import { asyncLocalStorage } from '../context/request-context';

export const CORRELATION_HEADER = 'x-request-id';
const SAFE_ID_PATTERN = /^[\w-]{1,128}$/;

/** ログ・転送して安全な値ならそのまま使い、それ以外は新しい UUID を採番する */
export function resolveCorrelationId(
  raw: string | string[] | undefined,
): string {
  const candidate = Array.isArray(raw) ? raw[0] : raw;
  return candidate !== undefined && SAFE_ID_PATTERN.test(candidate)
    ? candidate
    : randomUUID();
}

export function correlationIdMiddleware(
  req: Request,
  res: Response,
  next: NextFunction,
): void {
  const correlationId = resolveCorrelationId(req.headers[CORRELATION_HEADER]);

  // pino-http の genReqId はこの後にヘッダーを読む
  req.headers[CORRELATION_HEADER] = correlationId;
  res.setHeader(CORRELATION_HEADER, correlationId);

  asyncLocalStorage.run({ correlationId }, () => next());
}
