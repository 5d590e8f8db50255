/**
 * Parser constants.
 *
 * Tokens and patterns of the edge list text format.
 *
 * @module
 */

// Character constants
export const HASH = "#";
export const NEWLINE = "\n";

// Regex patterns
export const PURELY_NUMERIC_REGEX = /^[0-9]+$/;
export const WHITESPACE_RUN_REGEX = /\s+/;
