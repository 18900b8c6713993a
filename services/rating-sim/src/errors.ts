export type SimulationErrorCode = 'PRECONDITION_VIOLATION' | 'INVALID_CONFIGURATION';

export class SimulationError extends Error {
  public readonly code: SimulationErrorCode;

  constructor(message: string, code: SimulationErrorCode) {
    super(message);
    this.name = 'SimulationError';
    this.code = code;
  }
}

export class PreconditionViolationError extends SimulationError {
  constructor(message: string) {
    super(message, 'PRECONDITION_VIOLATION');
    this.name = 'PreconditionViolationError';
  }
}

export interface ConfigurationIssue {
  path: string;
  message: string;
}

export class InvalidConfigurationError extends SimulationError {
  public readonly issues: ConfigurationIssue[];

  constructor(message: string, issues: ConfigurationIssue[] = []) {
    super(message, 'INVALID_CONFIGURATION');
    this.name = 'InvalidConfigurationError';
    this.issues = issues;
  }
}
