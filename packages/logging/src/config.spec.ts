import { loadLoggerConfig } from './config';
import { InvalidLoggerConfigError, UnknownLogLevelError } from './errors';

describe('loadLoggerConfig', () => {
  it('should default to json output at info', () => {
    expect(loadLoggerConfig({})).toEqual({
      pretty: false,
      debug: false,
      level: 'info',
      cloud: {},
    });
  });

  it('should read flags, level and cloud identifiers', () => {
    expect(
      loadLoggerConfig({
        LOG_LEVEL: 'Warning',
        LOG_PRETTY: '1',
        LOG_DEBUG: 'true',
        WG_CLOUD_PROJECT_ID: 'proj-1',
        WG_CLOUD_DEPLOYMENT_ID: 'dep-1',
      }),
    ).toEqual({
      pretty: true,
      debug: true,
      level: 'warn',
      cloud: { projectId: 'proj-1', deploymentId: 'dep-1' },
    });
  });

  it('should treat empty values as unset', () => {
    expect(
      loadLoggerConfig({ LOG_LEVEL: '', LOG_PRETTY: '', LOG_DEBUG: '0' }),
    ).toEqual({
      pretty: false,
      debug: false,
      level: 'info',
      cloud: {},
    });
  });

  it('should surface an unknown level to the caller', () => {
    expect(() => loadLoggerConfig({ LOG_LEVEL: 'nonsense' })).toThrow(
      UnknownLogLevelError,
    );
    expect(() => loadLoggerConfig({ LOG_LEVEL: 'nonsense' })).toThrow(
      'unknown log level: nonsense',
    );
  });

  it('should reject malformed flags with sorted issues', () => {
    expect(() =>
      loadLoggerConfig({ LOG_PRETTY: 'yes', LOG_DEBUG: 'maybe' }),
    ).toThrow(InvalidLoggerConfigError);

    try {
      loadLoggerConfig({ LOG_PRETTY: 'yes', LOG_DEBUG: 'maybe' });
    } catch (error) {
      expect(error).toBeInstanceOf(InvalidLoggerConfigError);
      if (error instanceof InvalidLoggerConfigError) {
        expect(error.issues).toEqual([
          { path: 'LOG_DEBUG', message: 'must be one of true, false, 1, 0' },
          { path: 'LOG_PRETTY', message: 'must be one of true, false, 1, 0' },
        ]);
        expect(error.message).toBe(
          'Invalid logger configuration: LOG_DEBUG: must be one of true, false, 1, 0; LOG_PRETTY: must be one of true, false, 1, 0',
        );
      }
    }
  });
});
