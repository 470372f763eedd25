export type ServiceErrorCode =
  | 'not_found'
  | 'unauthorized'
  | 'invalid_state'
  | 'invalid_input'
  | 'transfer_failure';

export class ServiceError extends Error {
  constructor(
    public readonly statusCode: number,
    public readonly code: ServiceErrorCode,
    message: string
  ) {
    super(message);
    this.name = 'ServiceError';
  }
}

export const notFound = (message: string) => new ServiceError(404, 'not_found', message);

/** Caller is authenticated but lacks the role the operation requires. */
export const forbidden = (message: string) => new ServiceError(403, 'unauthorized', message);

/** Caller identity could not be established from the request signature. */
export const unauthenticated = (message: string) => new ServiceError(401, 'unauthorized', message);

export const invalidState = (message: string) => new ServiceError(409, 'invalid_state', message);

export const invalidInput = (message: string) => new ServiceError(400, 'invalid_input', message);

export const transferFailure = (message: string) => new ServiceError(422, 'transfer_failure', message);
