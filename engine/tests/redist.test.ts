/**
 * Wixpack Engine — Redistributable Tests
 */

import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { fetchRedistributable, REDISTRIBUTABLES } from "../src/redist";
import { AcquireError } from "../src/errors";
import { computeDigest } from "../src/verifier";
import { createLogger } from "../src/utils/logger";

const TEST_DIR = path.join(os.tmpdir(), "wixpack-redist-test");
const logger = createLogger({ level: "silent" });
const installer = Buffer.from("pretend vc_redist installer bytes");

const table = {
  x64: {
    url: "https://example.com/vc_redist.x64.exe",
    sha256: computeDigest(installer),
    filename: "vc_redist.x64.exe",
  },
};

async function captureAcquireError(
  promise: Promise<unknown>,
): Promise<AcquireError> {
  try {
    await promise;
  } catch (err) {
    if (err instanceof AcquireError) return err;
    throw err;
  }
  throw new Error("expected an AcquireError");
}

beforeEach(() => {
  fs.mkdirSync(TEST_DIR, { recursive: true });
});

afterEach(() => {
  fs.rmSync(TEST_DIR, { recursive: true, force: true });
});

describe("REDISTRIBUTABLES", () => {
  it("pins x86 and x64 over HTTPS", () => {
    expect(Object.keys(REDISTRIBUTABLES).sort()).toEqual(["x64", "x86"]);
    for (const entry of Object.values(REDISTRIBUTABLES)) {
      expect(entry?.url.startsWith("https://")).toBe(true);
      expect(entry?.sha256).toMatch(/^[a-f0-9]{64}$/);
    }
  });
});

describe("fetchRedistributable", () => {
  it("writes the verified installer into the destination directory", async () => {
    const fetch = vi.fn(async (_url: string, _logger: unknown) => installer);
    const destDir = path.join(TEST_DIR, "out");

    const filePath = await fetchRedistributable("x64", destDir, {
      logger,
      fetch,
      table,
    });

    expect(filePath).toBe(path.join(destDir, "vc_redist.x64.exe"));
    expect(fs.readFileSync(filePath)).toEqual(installer);
    expect(fetch).toHaveBeenCalledWith(table.x64.url, logger);
  });

  it("writes nothing when the digest does not match", async () => {
    const destDir = path.join(TEST_DIR, "out");

    const err = await captureAcquireError(
      fetchRedistributable("x64", destDir, {
        logger,
        fetch: async () => Buffer.from("tampered"),
        table,
      }),
    );

    expect(err.kind).toBe("integrity");
    expect(err.url).toBe(table.x64.url);
    expect(fs.existsSync(destDir)).toBe(false);
  });

  it("rejects an architecture without a pinned installer", async () => {
    const err = await captureAcquireError(
      fetchRedistributable("arm64", TEST_DIR, { logger }),
    );

    expect(err.kind).toBe("unsupported");
  });
});
