export class ConfigurationError extends Error {
  public readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(issues.length > 0 ? `${message}:\n  - ${issues.join('\n  - ')}` : message);
    this.name = 'ConfigurationError';
    this.issues = issues;
  }
}

export class StateStoreError extends Error {
  constructor(message: string, cause?: unknown) {
    super(cause instanceof Error ? `${message}: ${cause.message}` : message, { cause });
    this.name = 'StateStoreError';
  }
}

export class CycleAbortedError extends Error {
  constructor(runId: string, stage: string) {
    super(`Scan cycle ${runId} aborted during ${stage}`);
    this.name = 'CycleAbortedError';
  }
}

export class CycleInputError extends Error {
  constructor(message: string, cause?: unknown) {
    super(cause instanceof Error ? `${message}: ${cause.message}` : message, { cause });
    this.name = 'CycleInputError';
  }
}
