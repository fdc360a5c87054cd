export type LogFields = Record<string, unknown>;

export const REQUEST_ID_HEADER = 'X-Request-Id';

// Field name shared with the gateway's request logger; logs are joined on it.
const REQUEST_ID_FIELD = 'reqId';

const requestIdKey = Symbol('requestId');

/**
 * Immutable carrier of request-scoped values.
 * Each inbound request gets its own context; `with` returns a copy.
 */
export class RequestContext {
  private constructor(private readonly values: ReadonlyMap<symbol, unknown>) {}

  static empty(): RequestContext {
    return new RequestContext(new Map());
  }

  with(key: symbol, value: unknown): RequestContext {
    const values = new Map(this.values);
    values.set(key, value);
    return new RequestContext(values);
  }

  get(key: symbol): unknown {
    return this.values.get(key);
  }
}

export function contextWithRequestId(
  ctx: RequestContext,
  requestId: string,
): RequestContext {
  return ctx.with(requestIdKey, requestId);
}

/**
 * Returns the request id carried by `ctx`, or an empty string when there is
 * no context, no id, or a value that is not a string.
 */
export function requestIdFromContext(ctx?: RequestContext | null): string {
  if (!ctx) {
    return '';
  }
  const requestId = ctx.get(requestIdKey);
  return typeof requestId === 'string' ? requestId : '';
}

export function withRequestId(requestId: string): LogFields {
  return { [REQUEST_ID_FIELD]: requestId };
}

export function withRequestIdFromContext(
  ctx?: RequestContext | null,
): LogFields {
  return withRequestId(requestIdFromContext(ctx));
}
