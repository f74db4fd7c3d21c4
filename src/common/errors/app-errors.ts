import { HttpStatus } from '@nestjs/common';

export class AppError extends Error {
  constructor(
    public readonly code: string,
    message: string,
    public readonly httpStatus: number = HttpStatus.INTERNAL_SERVER_ERROR,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = 'AppError';
  }
}

export class NotFoundError extends AppError {
  constructor(message = 'Not found', details?: Record<string, unknown>) {
    super('NOT_FOUND', message, HttpStatus.NOT_FOUND, details);
  }
}

export class ConflictError extends AppError {
  constructor(
    code: 'SEED_ALREADY_MINTED' | 'SUPPLY_EXHAUSTED' | 'CONFLICT' = 'CONFLICT',
    message = 'Conflict',
    details?: Record<string, unknown>,
  ) {
    super(code, message, HttpStatus.CONFLICT, details);
  }
}

export class InvalidInputError extends AppError {
  constructor(message = 'Invalid input', details?: Record<string, unknown>) {
    super('INVALID_INPUT', message, HttpStatus.UNPROCESSABLE_ENTITY, details);
  }
}

/** A value outside the numeric domain of the field it was given for. */
export class DomainViolationError extends AppError {
  constructor(message = 'Domain violation', details?: Record<string, unknown>) {
    super(
      'DOMAIN_VIOLATION',
      message,
      HttpStatus.UNPROCESSABLE_ENTITY,
      details,
    );
  }
}

export class ArithmeticOverflowError extends AppError {
  constructor(
    message = 'Arithmetic overflow',
    details?: Record<string, unknown>,
  ) {
    super(
      'ARITHMETIC_OVERFLOW',
      message,
      HttpStatus.UNPROCESSABLE_ENTITY,
      details,
    );
  }
}

export class InternalError extends AppError {
  constructor(
    message = 'Internal error',
    details?: Record<string, unknown>,
    code = 'INTERNAL_ERROR',
  ) {
    super(code, message, HttpStatus.INTERNAL_SERVER_ERROR, details);
  }
}
