export class InputNotFoundError extends Error {
  constructor(public readonly inputs: string[]) {
    super(`No run-* directories found for: ${inputs.join(', ') || '(no inputs)'}`);
    this.name = 'InputNotFoundError';
  }
}

export class UnreadableLogError extends Error {
  constructor(
    public readonly file: string,
    public readonly cause?: Error
  ) {
    super(`Cannot read job log ${file}${cause ? `: ${cause.message}` : ''}`);
    this.name = 'UnreadableLogError';
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export class GitHubActionsError extends Error {
  constructor(
    message: string,
    public readonly statusCode?: number,
    public readonly cause?: Error
  ) {
    super(message);
    this.name = 'GitHubActionsError';
  }
}
