/**
 * Base error for everything the replay run raises on purpose
 */
export class NpcReplayError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'NpcReplayError';
  }
}

export class ConfigError extends NpcReplayError {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export class InputFileNotFoundError extends NpcReplayError {
  readonly path: string;

  constructor(path: string) {
    super(`Input file not found: ${path}`);
    this.name = 'InputFileNotFoundError';
    this.path = path;
  }
}

/**
 * One entry of the input batch that failed validation
 */
export interface InputIssue {
  index: number;
  message: string;
}

export class InputValidationError extends NpcReplayError {
  readonly issues: InputIssue[];

  constructor(message: string, issues: InputIssue[] = []) {
    super(message);
    this.name = 'InputValidationError';
    this.issues = issues;
  }
}
