import * as fs from "node:fs/promises";
import { createWriteStream } from "node:fs";
import { pipeline } from "node:stream/promises";
import type { ProgressCallback } from "../config/types.js";
import { logger } from "./logger.js";
import { describeError } from "../errors.js";

/** Non-2xx response */
export class HttpStatusError extends Error {
  constructor(
    public readonly status: number,
    statusText: string,
    url: string
  ) {
    super(`HTTP ${status} ${statusText} from ${url}`);
    this.name = "HttpStatusError";
  }
}

const BROWSER_HEADERS: Record<string, string> = {
  "User-Agent":
    "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0.0.0 Safari/537.36",
  "Accept-Encoding": "identity",
};

export interface JsonRequest {
  method: "GET" | "POST";
  headers?: Record<string, string>;
  /** Sent as application/x-www-form-urlencoded */
  form?: Record<string, string>;
  /** Sent as application/json */
  json?: unknown;
  /** Sent as multipart/form-data */
  multipart?: FormData;
  timeoutMs: number;
}

/**
 * Issue a request and parse the JSON body.
 * Rejects on network errors, timeouts, non-2xx status and invalid JSON.
 */
export async function requestJson(url: string, request: JsonRequest): Promise<unknown> {
  const headers: Record<string, string> = { ...BROWSER_HEADERS, ...request.headers };
  let body: string | FormData | undefined;

  if (request.form) {
    headers["Content-Type"] = "application/x-www-form-urlencoded";
    body = new URLSearchParams(request.form).toString();
    logger.logCurl(request.method, url, headers, request.form);
  } else if (request.json !== undefined) {
    headers["Content-Type"] = "application/json";
    body = JSON.stringify(request.json);
    logger.logCurl(request.method, url, headers, body);
  } else if (request.multipart) {
    body = request.multipart;
    logger.logCurl(request.method, url, headers);
  } else {
    logger.logCurl(request.method, url, headers);
  }

  const response = await fetch(url, {
    method: request.method,
    headers,
    body,
    signal: AbortSignal.timeout(request.timeoutMs),
  });

  if (!response.ok) {
    throw new HttpStatusError(response.status, response.statusText, url);
  }

  const text = await response.text();
  try {
    return JSON.parse(text);
  } catch {
    throw new Error(`Invalid JSON from ${url}: ${text.slice(0, 120)}`);
  }
}

export interface DownloadOptions {
  timeoutMs: number;
  onProgress?: ProgressCallback;
}

/**
 * Download a file from a URL to a local path.
 * The partial file is deleted if anything fails along the way.
 * Returns the number of bytes written.
 */
export async function downloadFile(
  url: string,
  destPath: string,
  options: DownloadOptions
): Promise<number> {
  const { onProgress } = options;
  onProgress?.(`Downloading from ${url}...`);

  const response = await fetch(url, {
    headers: BROWSER_HEADERS,
    signal: AbortSignal.timeout(options.timeoutMs),
  });
  if (!response.ok) {
    throw new HttpStatusError(response.status, response.statusText, url);
  }

  if (!response.body) {
    throw new Error("No response body received");
  }

  const body = response.body;
  const contentLength = response.headers.get("content-length");
  const totalBytes = contentLength ? parseInt(contentLength, 10) : null;
  let downloadedBytes = 0;
  let lastProgressPercent = 0;

  async function* chunks(): AsyncGenerator<Uint8Array> {
    const reader = body.getReader();
    let finished = false;
    try {
      while (true) {
        const { done, value } = await reader.read();
        if (done) {
          finished = true;
          return;
        }
        downloadedBytes += value.length;

        // Report progress every 25%
        if (totalBytes) {
          const percent = Math.floor((downloadedBytes / totalBytes) * 100);
          if (percent >= lastProgressPercent + 25) {
            const mb = (downloadedBytes / 1024 / 1024).toFixed(1);
            const totalMb = (totalBytes / 1024 / 1024).toFixed(1);
            onProgress?.(`  Downloaded ${mb}MB / ${totalMb}MB (${percent}%)`);
            lastProgressPercent = percent;
          }
        }
        yield value;
      }
    } finally {
      if (!finished) {
        // The file side failed first; stop the transfer
        await reader.cancel().catch((error: unknown) => {
          logger.debug(`Cancelling download from ${url} failed: ${describeError(error)}`);
        });
      }
    }
  }

  try {
    await pipeline(chunks(), createWriteStream(destPath));

    if (downloadedBytes === 0) {
      throw new Error(`Empty response body from ${url}`);
    }

    return downloadedBytes;
  } catch (error) {
    await fs.rm(destPath, { force: true });
    throw error;
  }
}
