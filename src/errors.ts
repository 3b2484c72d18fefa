/**
 * cql-schema-generator - Errors
 *
 * Error taxonomy for specification building and statement generation.
 */

/**
 * Error codes carried by every {@link CqlSchemaError}.
 */
export const ErrorCode = {
  INVALID_IDENTIFIER: 'INVALID_IDENTIFIER',
  INVALID_SPECIFICATION: 'INVALID_SPECIFICATION',
  ILLEGAL_OPTION: 'ILLEGAL_OPTION',
  UNSUPPORTED_SPECIFICATION: 'UNSUPPORTED_SPECIFICATION',
} as const;

export type ErrorCode = (typeof ErrorCode)[keyof typeof ErrorCode];

/**
 * Base class for errors raised by this library.
 */
export class CqlSchemaError extends Error {
  public readonly code: ErrorCode;

  constructor(message: string, code: ErrorCode) {
    super(message);
    this.name = 'CqlSchemaError';
    this.code = code;

    // Maintain stack trace in V8
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }
}

/**
 * A name matched neither the unquoted nor the quoted identifier grammar.
 */
export class InvalidIdentifierError extends CqlSchemaError {
  public readonly identifier: string;

  constructor(identifier: string) {
    super(`Given string [${identifier}] is not a valid quoted or unquoted identifier`, ErrorCode.INVALID_IDENTIFIER);
    this.name = 'InvalidIdentifierError';
    this.identifier = identifier;
  }
}

/**
 * A specification failed validation while it was being built.
 */
export class SpecificationValidationError extends CqlSchemaError {
  constructor(message: string) {
    super(message, ErrorCode.INVALID_SPECIFICATION);
    this.name = 'SpecificationValidationError';
  }
}

/**
 * An option is not legal for the statement being generated.
 */
export class IllegalOptionError extends CqlSchemaError {
  public readonly option: string;

  constructor(option: string, statement: string) {
    super(`Option [${option}] is not allowed in ${statement}`, ErrorCode.ILLEGAL_OPTION);
    this.name = 'IllegalOptionError';
    this.option = option;
  }
}

/**
 * The dispatcher was handed an object that is not a known specification.
 */
export class UnsupportedSpecificationError extends CqlSchemaError {
  public readonly specification: string;

  constructor(specification: string) {
    super(`Unsupported specification: ${specification}`, ErrorCode.UNSUPPORTED_SPECIFICATION);
    this.name = 'UnsupportedSpecificationError';
    this.specification = specification;
  }
}
