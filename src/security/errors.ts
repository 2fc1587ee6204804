/**
 * Base class for payload rewriting failures. Any of these aborts the request
 * (or replaces the response) instead of letting an unfiltered body through.
 */
export class XssFilterError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'XssFilterError';
  }
}

/**
 * Body was declared as JSON but did not parse
 */
export class NotJsonError extends XssFilterError {
  constructor(message = 'body is not valid JSON') {
    super(message);
    this.name = 'NotJsonError';
  }
}

/**
 * Top-level JSON value is neither an object nor an array of objects
 */
export class UnsupportedValueShapeError extends XssFilterError {
  constructor(message: string) {
    super(message);
    this.name = 'UnsupportedValueShapeError';
  }
}

export class MalformedFormError extends XssFilterError {
  constructor(message: string) {
    super(message);
    this.name = 'MalformedFormError';
  }
}

export class MalformedMultipartError extends XssFilterError {
  constructor(message: string) {
    super(message);
    this.name = 'MalformedMultipartError';
  }
}

/**
 * A multipart section had no content at all
 */
export class EmptyPartError extends XssFilterError {
  constructor(fieldName: string) {
    super(`multipart part "${fieldName}" is empty`);
    this.name = 'EmptyPartError';
  }
}
