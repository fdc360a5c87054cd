import 'reflect-metadata';
import { DynamicModule, Global, Module } from '@nestjs/common';
import { createLogger, type LoggerOptions } from '../logger';
import { LOGGER } from './logging.tokens';
import { RequestIdMiddleware } from './request-id.middleware';

/**
 * Registered once in the root module:
 * `LoggingModule.forRoot(loadLoggerConfig())`.
 */
@Global()
@Module({})
export class LoggingModule {
  static forRoot(options: LoggerOptions): DynamicModule {
    return {
      module: LoggingModule,
      providers: [
        { provide: LOGGER, useFactory: () => createLogger(options) },
        RequestIdMiddleware,
      ],
      exports: [LOGGER, RequestIdMiddleware],
    };
  }
}
