/**
 * @fileoverview Errors raised while decoding wire events.
 */

/**
 * Raised when raw data is not valid JSON.
 */
export class DecodeError extends Error {
  constructor(message: string) {
    super(`Malformed message: ${message}`);
    this.name = 'DecodeError';
  }
}

/**
 * Raised when a well-formed message is not a known event,
 * or a known event is missing fields or carries ill-typed ones.
 */
export class ProtocolError extends Error {
  readonly issues: readonly string[];

  constructor(issues: readonly string[]) {
    super(`Invalid event: ${issues.join('; ')}`);
    this.name = 'ProtocolError';
    this.issues = issues;
  }
}
