/**
 * Error taxonomy shared by every component. Read paths return `null` for a
 * missing id; only mutations raise NotFoundError.
 */
export class FitnessError extends Error {
  readonly code: string;

  constructor(code: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export class ValidationError extends FitnessError {
  constructor(message: string) {
    super('VALIDATION_ERROR', message);
  }
}

export class NotFoundError extends FitnessError {
  constructor(entity: string, id: string | number) {
    super('NOT_FOUND', `${entity} ${id} not found`);
  }
}

export class NotLoggedInError extends FitnessError {
  constructor() {
    super('NOT_LOGGED_IN', 'User not logged in');
  }
}

export class TransactionFailure extends FitnessError {
  constructor(cause: unknown) {
    super('TRANSACTION_FAILED', `Transaction rolled back: ${errorMessage(cause)}`, { cause });
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
