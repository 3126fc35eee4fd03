export class InternalError extends Error {
  constructor(message: string) {
    super(`Internal error: ${message}. Please report a bug!`);
    this.name = 'InternalError';
  }
}

export class CheckError extends Error {}

export class GeneratorDisposedError extends CheckError {
  constructor(readonly generatorName: string) {
    super(`Generator ${generatorName} has been disposed and cannot be resumed`);
    this.name = 'GeneratorDisposedError';
  }
}

export class GeneratorExhaustedError extends CheckError {
  constructor(readonly generatorName: string) {
    super(
      `Generator ${generatorName} is exhausted; set afterExhaustion to 'sentinel' to keep ` +
      'receiving EXHAUSTED instead');
    this.name = 'GeneratorExhaustedError';
  }
}

export class GeneratorRunningError extends CheckError {
  constructor(readonly generatorName: string) {
    super(`Generator ${generatorName} is already running and cannot be resumed from its own body`);
    this.name = 'GeneratorRunningError';
  }
}

/**
 * Thrown when resuming a generator whose body previously threw.  The original error is available as
 * `cause`.
 */
export class GeneratorFailedError extends CheckError {
  constructor(readonly generatorName: string, cause: unknown) {
    super(`Generator ${generatorName} failed on an earlier resume`, {cause});
    this.name = 'GeneratorFailedError';
  }
}
