/**
 * Host-pattern error types
 *
 * Raised while turning the ProxyCommand host token into an instance
 * selector. All three abort the run before any network call.
 *
 * @module host-errors
 */

import { BaseError } from "./errors.js";

/**
 * Invalid pattern error for templates that do not compile
 *
 * @public
 */
export class InvalidPatternError extends BaseError {
  /**
   * Create a new invalid pattern error
   *
   * @param message - User-friendly error message
   * @param pattern - The template as supplied by the user
   * @param cause - The SyntaxError raised by the RegExp constructor
   */
  constructor(message: string, pattern: string, cause?: unknown) {
    super(message, "INVALID_PATTERN", { pattern, cause });
  }
}

/**
 * Ambiguous host error when both a name and an id were captured
 *
 * @public
 */
export class AmbiguousHostError extends BaseError {
  /**
   * Create a new ambiguous host error
   *
   * @param message - User-friendly error message
   * @param hostname - Host token that was matched
   * @param pattern - The template that matched it
   */
  constructor(message: string, hostname: string, pattern: string) {
    super(message, "AMBIGUOUS_HOST", { hostname, pattern });
  }
}

/**
 * Unresolved host error when neither a name nor an id was captured
 *
 * @public
 */
export class UnresolvedHostError extends BaseError {
  /**
   * Create a new unresolved host error
   *
   * @param message - User-friendly error message
   * @param hostname - Host token that was matched
   * @param pattern - The template it was matched against
   */
  constructor(message: string, hostname: string, pattern: string) {
    super(message, "UNRESOLVED_HOST", { hostname, pattern });
  }
}
