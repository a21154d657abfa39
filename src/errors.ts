export class ProviderError extends Error {
  constructor(
    readonly provider: string,
    message: string
  ) {
    super(`${provider}: ${message}`);
    this.name = 'ProviderError';
  }
}

export class ProviderTimeoutError extends ProviderError {
  constructor(provider: string, readonly timeoutMs: number) {
    super(provider, `request timed out after ${timeoutMs}ms`);
    this.name = 'ProviderTimeoutError';
  }
}

export class PlanValidationError extends Error {
  constructor(readonly conflicts: string[]) {
    super(`Rename plan has ${conflicts.length} conflict(s): ${conflicts.join('; ')}`);
    this.name = 'PlanValidationError';
  }
}

export class ConfigError extends Error {
  constructor(
    readonly path: string,
    readonly issues: string[]
  ) {
    super(`Invalid configuration in ${path}:\n  ${issues.join('\n  ')}`);
    this.name = 'ConfigError';
  }
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
