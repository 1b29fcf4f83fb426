/**
 * Wixpack Engine — SHA-256 Checksum Verification
 *
 * Verifies downloaded bytes against a pinned digest before anything is
 * extracted or written. Pure functions: no I/O, no logging.
 */

import * as crypto from "crypto";
import { IntegrityError } from "./errors";

export interface VerificationResult {
  valid: boolean;
  /** Expected digest, normalised to lowercase hex */
  expected: string;
  /** Actual digest of the bytes, lowercase hex */
  actual: string;
}

const SHA256_HEX = /^[a-f0-9]{64}$/;

/**
 * Compute the SHA-256 digest of a buffer as lowercase hex.
 */
export function computeDigest(bytes: Buffer): string {
  return crypto.createHash("sha256").update(bytes).digest("hex");
}

/**
 * Decode an expected digest string.
 *
 * @throws IntegrityError (malformed_expected) unless it is 64 hex characters
 */
function decodeExpected(expectedHex: string): Buffer {
  const normalized = expectedHex.toLowerCase().trim();
  if (!SHA256_HEX.test(normalized)) {
    throw new IntegrityError(
      "malformed_expected",
      `Invalid SHA-256 hash format: "${expectedHex}". Expected 64 hex characters.`,
      expectedHex,
    );
  }
  return Buffer.from(normalized, "hex");
}

/**
 * Verify bytes against an expected SHA-256 hex digest.
 *
 * @returns Verification result with both expected and actual digests
 * @throws IntegrityError (malformed_expected) for an invalid expected digest
 */
export function verifyDigest(
  bytes: Buffer,
  expectedHex: string,
): VerificationResult {
  const expected = decodeExpected(expectedHex);
  const actual = crypto.createHash("sha256").update(bytes).digest();

  return {
    valid: crypto.timingSafeEqual(actual, expected),
    expected: expected.toString("hex"),
    actual: actual.toString("hex"),
  };
}

/**
 * Like verifyDigest, but a mismatch is an error.
 *
 * @returns The actual digest (lowercase hex)
 * @throws IntegrityError (mismatch | malformed_expected)
 */
export function assertDigest(bytes: Buffer, expectedHex: string): string {
  const result = verifyDigest(bytes, expectedHex);
  if (!result.valid) {
    throw new IntegrityError(
      "mismatch",
      `Checksum mismatch: expected ${result.expected}, got ${result.actual}`,
      result.expected,
      result.actual,
    );
  }
  return result.actual;
}
