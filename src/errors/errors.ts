/**
 * Error taxonomy for the delivery engine
 */

export type QuoteCastErrorKind =
  | 'not_found'
  | 'persistence'
  | 'already_delivered'
  | 'validation';

export class QuoteCastError extends Error {
  readonly kind: QuoteCastErrorKind;

  constructor(kind: QuoteCastErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'QuoteCastError';
    this.kind = kind;
  }
}

export function notFound(entity: string, id: string): QuoteCastError {
  return new QuoteCastError('not_found', `${entity} not found: ${id}`);
}

export function persistenceFailure(message: string, cause?: unknown): QuoteCastError {
  return new QuoteCastError('persistence', message, { cause });
}

export function alreadyDelivered(scheduleId: string): QuoteCastError {
  return new QuoteCastError('already_delivered', `Schedule ${scheduleId} already delivered today`);
}

export function validationFailure(message: string): QuoteCastError {
  return new QuoteCastError('validation', message);
}

/** Message of an unknown thrown value */
export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}
