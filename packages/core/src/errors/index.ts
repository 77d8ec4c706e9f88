/**
 * Custom Error Classes
 */

/**
 * Base error class for all aligner errors
 */
export class AlignerError extends Error {
  public readonly code: string;
  public readonly details?: Record<string, unknown>;

  constructor(
    message: string,
    code: string,
    details?: Record<string, unknown>,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'AlignerError';
    this.code = code;
    this.details = details;
    
    // Maintains proper stack trace
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Validation error for invalid inputs
 */
export class ValidationError extends AlignerError {
  constructor(field: string, message: string) {
    super(
      `Validation failed for ${field}: ${message}`,
      'VALIDATION_ERROR',
      { field, message }
    );
    this.name = 'ValidationError';
  }
}

export type XmlParseErrorKind = 'encoding' | 'syntax' | 'structure';

/**
 * A configuration document that could not be read as XML
 */
export class XmlParseError extends AlignerError {
  public readonly kind: XmlParseErrorKind;

  constructor(
    kind: XmlParseErrorKind,
    message: string,
    details?: Record<string, unknown>,
    options?: { cause?: unknown }
  ) {
    super(message, 'XML_PARSE_ERROR', { kind, ...details }, options);
    this.name = 'XmlParseError';
    this.kind = kind;
  }
}
