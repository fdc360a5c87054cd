import { createParamDecorator, ExecutionContext } from '@nestjs/common';
import { RequestContext } from '../request-context';
import type { RequestWithContext } from './request-id.middleware';

export function requestContextOf(
  req: Pick<RequestWithContext, 'requestContext'>,
): RequestContext {
  return req.requestContext ?? RequestContext.empty();
}

/**
 * Hands the request's context to a route handler:
 * `handle(@ReqContext() ctx: RequestContext)`.
 */
export const ReqContext = createParamDecorator(
  (_data: unknown, ctx: ExecutionContext): RequestContext =>
    requestContextOf(ctx.switchToHttp().getRequest<RequestWithContext>()),
);
