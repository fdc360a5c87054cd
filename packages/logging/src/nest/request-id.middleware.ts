import 'reflect-metadata';
import { randomUUID } from 'node:crypto';
import type { IncomingHttpHeaders } from 'node:http';
import { Injectable, NestMiddleware } from '@nestjs/common';
import type { Logger } from '../logger';
import {
  REQUEST_ID_HEADER,
  RequestContext,
  contextWithRequestId,
  withRequestId,
} from '../request-context';
import { InjectLogger } from './logging.tokens';

export interface RequestWithContext {
  method?: string;
  url?: string;
  headers: IncomingHttpHeaders;
  requestContext?: RequestContext;
}

export interface ResponseWithHeaders {
  setHeader(name: string, value: string): unknown;
}

/**
 * First non-blank X-Request-Id value of the incoming headers.
 */
export function incomingRequestId(
  headers: IncomingHttpHeaders,
): string | undefined {
  const value = headers[REQUEST_ID_HEADER.toLowerCase()];
  const candidates = Array.isArray(value) ? value : [value];
  for (const candidate of candidates) {
    const trimmed = candidate?.trim();
    if (trimmed) {
      return trimmed;
    }
  }
  return undefined;
}

/**
 * Gives every request a context carrying its request id, taken from the
 * X-Request-Id header or minted here, and echoes the id back to the caller.
 */
@Injectable()
export class RequestIdMiddleware
  implements NestMiddleware<RequestWithContext, ResponseWithHeaders>
{
  constructor(@InjectLogger() private readonly logger: Logger) {}

  use(
    req: RequestWithContext,
    res: ResponseWithHeaders,
    next: () => void,
  ): void {
    const requestId = incomingRequestId(req.headers) ?? randomUUID();

    req.requestContext = contextWithRequestId(
      RequestContext.empty(),
      requestId,
    );
    res.setHeader(REQUEST_ID_HEADER, requestId);

    this.logger.debug(
      { ...withRequestId(requestId), method: req.method, url: req.url },
      'request received',
    );

    next();
  }
}
