/** The latency probe facility cannot be constructed; the run never starts. */
export class ProbeSetupError extends Error {
  override readonly name = 'ProbeSetupError';

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
  }
}

export class HttpStatusError extends Error {
  override readonly name = 'HttpStatusError';

  constructor(
    readonly url: string,
    readonly status: number,
  ) {
    super(`HTTP ${status} for ${url}`);
  }
}

export class PersistenceError extends Error {
  override readonly name = 'PersistenceError';

  constructor(
    message: string,
    readonly path: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

export class ConfigError extends Error {
  override readonly name = 'ConfigError';

  constructor(
    message: string,
    readonly issues: string[] = [],
  ) {
    super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message);
  }
}
