// src/utils/errors.ts

/**
 * Base class for faults that stop a run before any pipeline stage executes.
 * Data problems are never thrown; they are findings in the ErrorReport.
 */
export class GateError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'GateError';
  }
}

export class LoadError extends GateError {
  constructor(
    public sourcePath: string,
    message: string
  ) {
    super(`[${sourcePath}] ${message}`);
    this.name = 'LoadError';
  }
}

export class ConfigurationError extends GateError {
  constructor(
    message: string,
    public issues: string[] = []
  ) {
    super(issues.length > 0 ? `${message}\n${issues.map((i) => `  - ${i}`).join('\n')}` : message);
    this.name = 'ConfigurationError';
  }
}
