import type { Logger } from './logger';
import type { LogFields } from './request-context';

const COMPONENT_KEY = 'component';

// pino children inherit from their parent, so descendants see the name too.
const componentName = Symbol('component');

/**
 * Duration field rendered in seconds.
 */
export function withDuration(key: string, durationMs: number): LogFields {
  return { [key]: durationMs / 1000 };
}

/**
 * Derives a logger tagged with `component`. Naming an already named logger
 * joins both names with a dot.
 */
export function named(logger: Logger, component: string): Logger {
  const parent = Reflect.get(logger, componentName);
  const name =
    typeof parent === 'string' && parent !== ''
      ? `${parent}.${component}`
      : component;
  const child = logger.child({});
  Object.defineProperty(child, componentName, { value: name });
  return child;
}

/**
 * The `component` field of records written by `logger`, written once by the
 * record mixin however deeply the logger is named.
 */
export function componentFields(logger: Logger): LogFields {
  const name = Reflect.get(logger, componentName);
  return typeof name === 'string' ? { [COMPONENT_KEY]: name } : {};
}
