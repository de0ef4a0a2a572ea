/**
 * Errors surfaced to the host
 *
 * "No match" is a normal navigation outcome and is never thrown.
 */

export type NavigationErrorCode =
  | 'INVALID_OFFSET'
  | 'UNRESOLVABLE_GRID'
  | 'INVALID_REQUEST'
  | 'INVALID_KEY_BINDINGS';

export class NavigationError extends Error {
  readonly code: NavigationErrorCode;

  constructor(code: NavigationErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'NavigationError';
    this.code = code;
  }
}

/**
 * Cursor offset outside `[0, text.length]` or not an integer
 */
export class InvalidOffsetError extends NavigationError {
  constructor(
    public readonly offset: number,
    public readonly textLength: number
  ) {
    super('INVALID_OFFSET', `Cursor offset ${offset} is outside the document (length ${textLength})`);
    this.name = 'InvalidOffsetError';
  }
}

/**
 * Cell movement was requested but no table contains the cursor
 */
export class UnresolvableGridError extends NavigationError {
  constructor(public readonly offset: number) {
    super('UNRESOLVABLE_GRID', `Not inside a table (offset ${offset})`);
    this.name = 'UnresolvableGridError';
  }
}

export class InvalidRequestError extends NavigationError {
  constructor(message: string) {
    super('INVALID_REQUEST', message);
    this.name = 'InvalidRequestError';
  }
}

export class KeyBindingsError extends NavigationError {
  constructor(message: string, cause?: unknown) {
    super('INVALID_KEY_BINDINGS', message, { cause });
    this.name = 'KeyBindingsError';
  }
}
