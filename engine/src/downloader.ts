/**
 * Wixpack Engine — Archive Downloader
 *
 * Fetches a whole response body into memory. The archive must be verified
 * before any of it reaches the disk, so nothing is streamed to a file here.
 * HTTPS only — HTTP URLs are rejected.
 */

import * as https from "https";
import { AcquireError } from "./errors";
import { Logger } from "./utils/logger";

export interface DownloadProgress {
  bytes_downloaded: number;
  bytes_total: number;
  percent: number;
}

export type ProgressCallback = (progress: DownloadProgress) => void;

/**
 * Anything that can turn a URL into the full body bytes.
 * Injected by tests so they never reach the network.
 */
export type Fetcher = (url: string, logger: Logger) => Promise<Buffer>;

const MAX_REDIRECTS = 5;
const IDLE_TIMEOUT_MS = 60_000;

/**
 * Download a URL into a Buffer.
 *
 * @throws AcquireError (network) on non-HTTPS URLs, transport failure,
 *   non-2xx (or 206) status, too many redirects or an idle timeout
 */
export async function downloadBytes(
  url: string,
  logger: Logger,
  onProgress?: ProgressCallback,
): Promise<Buffer> {
  return fetchWithRedirects(url, logger, onProgress, 0);
}

function fetchWithRedirects(
  url: string,
  logger: Logger,
  onProgress: ProgressCallback | undefined,
  hops: number,
): Promise<Buffer> {
  if (!url.startsWith("https://")) {
    return Promise.reject(
      new AcquireError("network", `Download URL must be HTTPS. Got: ${url}`, {
        url,
      }),
    );
  }

  logger.info({ url }, "Starting download");
  const startTime = Date.now();

  return new Promise<Buffer>((resolve, reject) => {
    const request = https.get(url, (response) => {
      const status = response.statusCode ?? 0;

      if (status >= 300 && status < 400 && response.headers.location) {
        response.resume();
        if (hops >= MAX_REDIRECTS) {
          reject(
            new AcquireError(
              "network",
              `Too many redirects (${MAX_REDIRECTS}) for ${url}`,
              { url },
            ),
          );
          return;
        }
        const redirectUrl = new URL(response.headers.location, url).toString();
        logger.debug({ redirect: redirectUrl }, "Following redirect");
        fetchWithRedirects(redirectUrl, logger, onProgress, hops + 1)
          .then(resolve)
          .catch(reject);
        return;
      }

      // 206 would mean a partial body
      if (status < 200 || status >= 300 || status === 206) {
        response.resume();
        reject(
          new AcquireError(
            "network",
            `Download failed: HTTP ${status} for ${url}`,
            { url },
          ),
        );
        return;
      }

      const totalBytes = parseInt(
        response.headers["content-length"] || "0",
        10,
      );
      const chunks: Buffer[] = [];
      let downloadedBytes = 0;

      response.on("data", (chunk: Buffer) => {
        chunks.push(chunk);
        downloadedBytes += chunk.length;
        if (onProgress && totalBytes > 0) {
          onProgress({
            bytes_downloaded: downloadedBytes,
            bytes_total: totalBytes,
            percent: Math.round((downloadedBytes / totalBytes) * 100),
          });
        }
      });

      response.on("end", () => {
        logger.info(
          {
            url,
            bytes: downloadedBytes,
            duration_ms: Date.now() - startTime,
          },
          "Download complete",
        );
        resolve(Buffer.concat(chunks));
      });

      response.on("error", (err) => {
        reject(
          new AcquireError(
            "network",
            `Download interrupted: ${err.message}`,
            { url, cause: err },
          ),
        );
      });
    });

    request.on("error", (err) => {
      reject(
        new AcquireError("network", `Download request failed: ${err.message}`, {
          url,
          cause: err,
        }),
      );
    });

    request.setTimeout(IDLE_TIMEOUT_MS, () => {
      request.destroy();
      reject(
        new AcquireError(
          "network",
          `Download timed out after ${IDLE_TIMEOUT_MS / 1000} seconds: ${url}`,
          { url },
        ),
      );
    });
  });
}
