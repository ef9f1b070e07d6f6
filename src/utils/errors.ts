export class AppError extends Error {
  constructor(
    public statusCode: number,
    message: string,
    public isOperational: boolean = true
  ) {
    super(message);
    Object.setPrototypeOf(this, AppError.prototype);
  }
}

export class ServiceError extends Error {
  constructor(
    public service: string,
    public operation: string,
    public originalError: Error,
    public retryable: boolean = true
  ) {
    super(`${service}.${operation} failed: ${originalError.message}`);
    Object.setPrototypeOf(this, ServiceError.prototype);
  }
}

export class ValidationError extends AppError {
  constructor(message: string) {
    super(400, message, true);
    Object.setPrototypeOf(this, ValidationError.prototype);
  }
}

export class ReservationNotFoundError extends AppError {
  constructor(public reservationId: string) {
    super(404, `Reservation not found: ${reservationId}`, true);
    Object.setPrototypeOf(this, ReservationNotFoundError.prototype);
  }
}

export class StoreReadError extends AppError {
  constructor(
    public filePath: string,
    public originalError: Error
  ) {
    super(500, `Reservation store could not be read (${filePath}): ${originalError.message}`, false);
    Object.setPrototypeOf(this, StoreReadError.prototype);
  }
}

export class StoreWriteError extends AppError {
  constructor(
    message: string,
    public originalError?: Error
  ) {
    super(500, message, true);
    Object.setPrototypeOf(this, StoreWriteError.prototype);
  }
}

export class DuplicateReservationError extends StoreWriteError {
  constructor(public reservationId: string) {
    super(`Reservation already exists: ${reservationId}`);
    Object.setPrototypeOf(this, DuplicateReservationError.prototype);
  }
}

export class DeliveryError extends AppError {
  constructor(
    public provider: string,
    public operation: string,
    public originalError: Error,
    public retryable: boolean = true
  ) {
    super(502, `Delivery provider error: ${provider}.${operation}`, true);
    Object.setPrototypeOf(this, DeliveryError.prototype);
  }
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/** HTTP status carried by SDK errors, if any. */
export function errorStatus(error: unknown): number | undefined {
  if (typeof error === 'object' && error !== null && 'status' in error && typeof error.status === 'number') {
    return error.status;
  }
  return undefined;
}

export function errorCode(error: unknown): number | string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error) {
    const { code } = error;
    if (typeof code === 'number' || typeof code === 'string') return code;
  }
  return undefined;
}
