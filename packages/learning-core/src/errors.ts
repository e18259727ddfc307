// ---------------------------------------------------------------------------
// Error kinds raised at the estimator boundary
// ---------------------------------------------------------------------------

export type LearningErrorCode = 'NOT_FITTED' | 'INVALID_INPUT';

/** Base class for every error thrown by an estimator. */
export class LearningError extends Error {
  constructor(
    public readonly code: LearningErrorCode,
    message: string,
  ) {
    super(message);
    this.name = 'LearningError';
  }
}

/** A query method was called before a successful `fit`. */
export class NotFittedError extends LearningError {
  constructor(estimator: string, method: string) {
    super('NOT_FITTED', `${estimator} is not fitted. Call fit() before ${method}().`);
    this.name = 'NotFittedError';
  }
}

/** Inputs or options the algorithms cannot be run on. */
export class InvalidInputError extends LearningError {
  constructor(
    message: string,
    public readonly fields: Record<string, string[] | undefined> = {},
  ) {
    super('INVALID_INPUT', message);
    this.name = 'InvalidInputError';
  }
}
