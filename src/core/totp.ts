/**
 * Second-factor code handling: normalization, format check and TOTP verification.
 *
 * Verification is local computation only; nothing here performs I/O.
 */

import speakeasy from 'speakeasy';

/** TOTP time step in seconds */
export const TOTP_STEP_SECONDS = 30;

/** Steps of drift accepted on either side of the current one */
export const DEFAULT_TOTP_WINDOW = 1;

const CODE_FORMAT = /^\d{6}$/;

/**
 * Strip whitespace and `-` separators: "123 456", "123-456" and "123456" are equal.
 */
export function normalizeCode(code: string): string {
  return code.replace(/[\s-]/g, '');
}

export function isValidCodeFormat(code: string): boolean {
  return CODE_FORMAT.test(code);
}

/**
 * Second-factor verifier contract.
 */
export interface TotpVerifier {
  /**
   * @param window - accepted drift, in time steps, on either side of now
   */
  verify(secret: string, code: string, window: number): boolean;
}

/**
 * RFC 6238 verifier over base32 secrets (30 second step, 6 digits).
 */
export class SpeakeasyTotpVerifier implements TotpVerifier {
  constructor(private readonly now: () => number = Date.now) {}

  verify(secret: string, code: string, window: number): boolean {
    return speakeasy.totp.verify({
      secret,
      encoding: 'base32',
      token: code,
      step: TOTP_STEP_SECONDS,
      window,
      time: Math.floor(this.now() / 1000),
    });
  }
}
