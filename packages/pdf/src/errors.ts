export type ErrorCode =
  | 'InvalidGrid'
  | 'InvalidSigmaGrid'
  | 'MissingInput'
  | 'InvalidInput';

export abstract class KernelPdfError extends Error {
  abstract readonly code: ErrorCode;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** The output grid has fewer than 2 points or is not evenly spaced */
export class InvalidGridError extends KernelPdfError {
  readonly code = 'InvalidGrid';
}

/**
 * The sigma grid has fewer than 2 points, holds a non-positive value, is not
 * evenly spaced, or the truncation factor is not a positive number
 */
export class InvalidSigmaGridError extends KernelPdfError {
  readonly code = 'InvalidSigmaGrid';
}

/** Neither (values, sigmas) nor (gridIndices, dictIndices) were given */
export class MissingInputError extends KernelPdfError {
  readonly code = 'MissingInput';
}

export class InvalidInputError extends KernelPdfError {
  readonly code = 'InvalidInput';
}
