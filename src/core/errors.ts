// Raised when a word list or input path cannot be read or decoded.
// Fatal for the run that needed it; callers must not retry.
export class ResourceError extends Error {
  readonly path: string;

  constructor(message: string, options: { path: string; cause?: unknown }) {
    super(message, { cause: options.cause });
    this.name = 'ResourceError';
    this.path = options.path;
  }
}

export class ConfigError extends Error {
  readonly issues: unknown;

  constructor(message: string, issues: unknown) {
    super(message);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}
