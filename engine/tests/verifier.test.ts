/**
 * Wixpack Engine — Checksum Verifier Tests
 */

import { describe, it, expect } from "vitest";
import * as crypto from "crypto";
import { assertDigest, computeDigest, verifyDigest } from "../src/verifier";
import { IntegrityError } from "../src/errors";

const ABC_SHA256 =
  "ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad";

const payload = Buffer.from("wixpack verifier payload", "utf-8");
const payloadHash = crypto.createHash("sha256").update(payload).digest("hex");

describe("computeDigest", () => {
  it("computes the SHA-256 of a buffer as lowercase hex", () => {
    expect(computeDigest(Buffer.from("abc"))).toBe(ABC_SHA256);
  });

  it("handles an empty buffer", () => {
    expect(computeDigest(Buffer.alloc(0))).toBe(
      "e3b0c44298fc1c149afbf4c8996fb92427ae41e4649b934ca495991b7852b855",
    );
  });
});

describe("verifyDigest", () => {
  it("returns valid: true for a matching digest", () => {
    const result = verifyDigest(payload, payloadHash);
    expect(result.valid).toBe(true);
    expect(result.expected).toBe(payloadHash);
    expect(result.actual).toBe(payloadHash);
  });

  it("returns valid: false for a different digest", () => {
    const wrongHash = "a".repeat(64);
    const result = verifyDigest(payload, wrongHash);
    expect(result.valid).toBe(false);
    expect(result.expected).toBe(wrongHash);
    expect(result.actual).toBe(payloadHash);
  });

  it("accepts uppercase and padded hex", () => {
    const result = verifyDigest(payload, `  ${payloadHash.toUpperCase()} `);
    expect(result.valid).toBe(true);
    expect(result.expected).toBe(payloadHash);
  });

  it("fails after flipping any single bit of the payload", () => {
    for (let byte = 0; byte < payload.length; byte++) {
      for (let bit = 0; bit < 8; bit++) {
        const tampered = Buffer.from(payload);
        tampered[byte] ^= 1 << bit;
        expect(verifyDigest(tampered, payloadHash).valid).toBe(false);
      }
    }
  });

  it.each([
    ["too short", "abc123"],
    ["too long", "a".repeat(65)],
    ["odd length", "a".repeat(63)],
    ["non-hex characters", "g".repeat(64)],
    ["empty", ""],
  ])("rejects a malformed expected digest (%s)", (_label, expected) => {
    try {
      verifyDigest(payload, expected);
      expect.unreachable("verifyDigest should throw");
    } catch (err) {
      if (!(err instanceof IntegrityError)) throw err;
      expect(err.kind).toBe("malformed_expected");
    }
  });
});

describe("assertDigest", () => {
  it("returns the actual digest on a match", () => {
    expect(assertDigest(Buffer.from("abc"), ABC_SHA256)).toBe(ABC_SHA256);
  });

  it("throws a mismatch error carrying both digests", () => {
    try {
      assertDigest(Buffer.from("abd"), ABC_SHA256);
      expect.unreachable("assertDigest should throw");
    } catch (err) {
      if (!(err instanceof IntegrityError)) throw err;
      expect(err.kind).toBe("mismatch");
      expect(err.expected).toBe(ABC_SHA256);
      expect(err.actual).toBe(computeDigest(Buffer.from("abd")));
    }
  });
});
