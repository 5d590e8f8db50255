/**
 * Parse error definitions.
 *
 * This module defines error types used by the edge list parser.
 *
 * @module
 */
export class ParseError extends Error {}

/**
 * A parse error pinned to a 1-based line of the input.
 */
export class EdgeListParseError extends ParseError {
  constructor(readonly line: number, reason: string) {
    super(`line ${line}: ${reason}`);
  }
}
