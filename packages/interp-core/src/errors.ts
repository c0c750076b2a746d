export type NumericErrorCode =
  | 'EmptyInput'
  | 'LengthMismatch'
  | 'DimensionMismatch'
  | 'InsufficientPoints'
  | 'InvalidDomain'
  | 'InvalidArgument'
  | 'SingularMatrix'
  | 'NearSingularDenominator';

export class NumericError extends Error {
  constructor(public readonly code: NumericErrorCode, message: string) {
    super(message);
    this.name = 'NumericError';
  }
}

export class EmptyInputError extends NumericError {
  constructor(message: string) {
    super('EmptyInput', message);
    this.name = 'EmptyInputError';
  }
}

export class LengthMismatchError extends NumericError {
  constructor(message: string) {
    super('LengthMismatch', message);
    this.name = 'LengthMismatchError';
  }
}

export class DimensionMismatchError extends NumericError {
  constructor(message: string) {
    super('DimensionMismatch', message);
    this.name = 'DimensionMismatchError';
  }
}

export class InsufficientPointsError extends NumericError {
  constructor(message: string) {
    super('InsufficientPoints', message);
    this.name = 'InsufficientPointsError';
  }
}

export class InvalidDomainError extends NumericError {
  constructor(message: string) {
    super('InvalidDomain', message);
    this.name = 'InvalidDomainError';
  }
}

export class InvalidArgumentError extends NumericError {
  constructor(message: string) {
    super('InvalidArgument', message);
    this.name = 'InvalidArgumentError';
  }
}

export class SingularMatrixError extends NumericError {
  constructor(message: string) {
    super('SingularMatrix', message);
    this.name = 'SingularMatrixError';
  }
}

export class NearSingularDenominatorError extends NumericError {
  constructor(message: string) {
    super('NearSingularDenominator', message);
    this.name = 'NearSingularDenominatorError';
  }
}

export function isNumericError(err: unknown, code?: NumericErrorCode): err is NumericError {
  return err instanceof NumericError && (code === undefined || err.code === code);
}
