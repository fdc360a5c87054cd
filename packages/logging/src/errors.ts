export interface ConfigIssue {
  path: string;
  message: string;
}

export class UnknownLogLevelError extends Error {
  constructor(public readonly level: string) {
    super(`unknown log level: ${level}`);
    this.name = 'UnknownLogLevelError';
  }
}

export class InvalidLoggerConfigError extends Error {
  constructor(public readonly issues: ConfigIssue[]) {
    super(
      `Invalid logger configuration: ${issues
        .map((issue) => `${issue.path}: ${issue.message}`)
        .join('; ')}`,
    );
    this.name = 'InvalidLoggerConfigError';
  }
}
