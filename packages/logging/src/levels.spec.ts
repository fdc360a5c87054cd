import { UnknownLogLevelError } from './errors';
import { findLogLevel } from './levels';

describe('findLogLevel', () => {
  it.each([
    ['debug', 'debug'],
    ['info', 'info'],
    ['warning', 'warn'],
    ['error', 'error'],
    ['fatal', 'fatal'],
    ['panic', 'panic'],
  ])('should map %s to %s', (name, level) => {
    expect(findLogLevel(name)).toBe(level);
  });

  it('should ignore letter case', () => {
    expect(findLogLevel('DEBUG')).toBe('debug');
    expect(findLogLevel('Debug')).toBe('debug');
    expect(findLogLevel('dEbUg')).toBe('debug');
    expect(findLogLevel('Warning')).toBe('warn');
  });

  it('should reject names that are not levels', () => {
    expect(() => findLogLevel('nonsense')).toThrow(UnknownLogLevelError);
    expect(() => findLogLevel('nonsense')).toThrow(
      'unknown log level: nonsense',
    );
  });

  it('should keep the rejected input verbatim', () => {
    expect(() => findLogLevel('Verbose')).toThrow(UnknownLogLevelError);

    try {
      findLogLevel('Verbose');
    } catch (error) {
      expect(error).toBeInstanceOf(UnknownLogLevelError);
      if (error instanceof UnknownLogLevelError) {
        expect(error.level).toBe('Verbose');
        expect(error.message).toBe('unknown log level: Verbose');
      }
    }
  });

  it('should not accept partial or aliased names', () => {
    expect(() => findLogLevel('warn')).toThrow(UnknownLogLevelError);
    expect(() => findLogLevel('deb')).toThrow(UnknownLogLevelError);
    expect(() => findLogLevel('')).toThrow('unknown log level: ');
  });
});
