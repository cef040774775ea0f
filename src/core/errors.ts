/** Raised when the run is interrupted by the user (SIGINT). */
export class PipelineInterruptedError extends Error {
  override readonly name = 'PipelineInterruptedError';
  readonly exitCode = 130;

  constructor(message = 'Pipeline interrupted by user') {
    super(message);
  }
}

/** Raised when a project config file does not have the expected shape. */
export class ConfigError extends Error {
  override readonly name = 'ConfigError';
  readonly file: string;

  constructor(file: string, detail: string) {
    super(`Invalid ${file}: ${detail}`);
    this.file = file;
  }
}
