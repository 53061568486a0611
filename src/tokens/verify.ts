/**
 * signet-tokens - Token Verification
 *
 * Single-pass verifier: parse header, select algorithm, verify signature,
 * check revocation, validate time claims, then run any extra validators.
 * The first failing step decides the one error returned.
 */

import { base64urlDecode, verify, SigningKey } from '../crypto';
import { extractStandardClaims, nowSeconds, parsePayload } from '../claims';
import {
  Algorithm,
  Clock,
  RevocationChecker,
  TokenError,
  TOKEN_ERRORS,
  TOKEN_ERROR_MESSAGES,
  TOKEN_ERROR_MESSAGE_HELPERS,
  VerificationResult,
  VerifiedToken,
} from '../types';
import { parseHeader, signingInputOf, splitToken } from './compact';
import { DEFAULT_LEEWAY } from './constants';
import { ClaimValidator, validateTimeClaims } from './validators';

export interface VerifyTokenOptions {
  /** The compact token to verify */
  token: string;
  /** HMAC secret, or public (or private) `KeyObject` */
  key: SigningKey;
  /** Accepted algorithms (default: all registered) */
  algorithms?: readonly Algorithm[];
  /** Clock skew tolerance in seconds (default: 0) */
  leeway?: number;
  /** Time source (default: `Date.now`) */
  clock?: Clock;
  /** Revocation collaborator; revocation is skipped without one */
  blocklist?: RevocationChecker;
  /** Extra checks run after time validation, in order */
  validators?: readonly ClaimValidator[];
}

function fail(error: TokenError): VerificationResult {
  return { valid: false, error };
}

/**
 * Verify a compact token.
 *
 * Never throws for token problems; claims are only reachable from the
 * valid arm of the result.
 *
 * @example
 * ```typescript
 * const result = verifyToken({ token, key: publicKey, leeway: 30 });
 * if (result.valid) {
 *   const custom = decodeCustomClaims(result.token);
 * } else {
 *   console.error(result.error.errorKey);
 * }
 * ```
 */
export function verifyToken(options: VerifyTokenOptions): VerificationResult {
  const {
    token,
    key,
    algorithms,
    leeway = DEFAULT_LEEWAY,
    clock = Date.now,
    blocklist,
    validators = [],
  } = options;

  try {
    // 1. Parse header
    const [headerSegment, payloadSegment, signatureSegment] = splitToken(token);
    const { header, headerBytes } = parseHeader(headerSegment);

    // 2. Select algorithm
    if (algorithms && !algorithms.includes(header.alg)) {
      return fail(
        new TokenError(TOKEN_ERRORS.UNKNOWN_ALGORITHM, TOKEN_ERROR_MESSAGE_HELPERS.algorithmNotAllowed(header.alg))
      );
    }

    // 3. Verify signature over the transmitted bytes
    const signature = base64urlDecode(signatureSegment);
    if (!verify(signingInputOf(token), signature, key, header.alg)) {
      return fail(new TokenError(TOKEN_ERRORS.SIGNATURE_INVALID, TOKEN_ERROR_MESSAGES.SIGNATURE_VERIFICATION_FAILED));
    }

    const payload = base64urlDecode(payloadSegment);
    const claims = Object.freeze(extractStandardClaims(parsePayload(payload)));
    const verified: VerifiedToken = Object.freeze({
      token,
      header: Object.freeze(header),
      headerBytes,
      payload,
      signature,
      claims,
    });

    // 4. Check revocation
    if (blocklist && blocklist.isBlocked(blocklist.identify(verified))) {
      return fail(new TokenError(TOKEN_ERRORS.BLOCKED, TOKEN_ERROR_MESSAGES.TOKEN_BLOCKED));
    }

    // 5. Validate time claims, then opt-in validators
    const context = { now: nowSeconds(clock), leeway };
    for (const validate of [validateTimeClaims, ...validators]) {
      const error = validate(claims, context);
      if (error) {
        return fail(error);
      }
    }

    return { valid: true, token: verified };
  } catch (error) {
    if (error instanceof TokenError) {
      return fail(error);
    }
    return fail(new TokenError(TOKEN_ERRORS.MALFORMED_TOKEN, TOKEN_ERROR_MESSAGES.FAILED_TO_VERIFY_TOKEN));
  }
}
