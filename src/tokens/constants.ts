/**
 * @fileoverview Token defaults
 * @module signet-tokens/tokens/constants
 */

/**
 * @constant TOKEN_SEGMENT_DELIMITER
 * @description Separator between the three compact segments.
 */
export const TOKEN_SEGMENT_DELIMITER = '.';

/**
 * @constant TOKEN_DELIMITER_COUNT
 * @description Exact number of delimiters in a compact token.
 */
export const TOKEN_DELIMITER_COUNT = 2;

/**
 * @constant DEFAULT_LEEWAY
 * @description Clock skew tolerance, in seconds, applied to `nbf` and `exp`.
 */
export const DEFAULT_LEEWAY = 0;
