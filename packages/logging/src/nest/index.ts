export { LoggingModule } from './logging.module';
export { LOGGER, InjectLogger } from './logging.tokens';
export {
  RequestIdMiddleware,
  incomingRequestId,
  type RequestWithContext,
  type ResponseWithHeaders,
} from './request-id.middleware';
export { ReqContext, requestContextOf } from './request-context.decorator';
