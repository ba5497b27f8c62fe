import * as fs from "node:fs/promises";
import * as path from "node:path";
import type { AcquisitionRequest, AcquisitionResult, PlatformMetadata } from "../types.js";
import { downloadFile } from "../../utils/http.js";
import { uniqueStem } from "../../utils/names.js";

/**
 * Download a relay's direct media URL into the staging directory under a
 * unique name. downloadFile removes the partial file when it fails.
 */
export async function stageRemoteMedia(
  provider: string,
  mediaUrl: string,
  extension: string,
  request: AcquisitionRequest,
  timeoutMs: number,
  metadata?: PlatformMetadata
): Promise<AcquisitionResult> {
  await fs.mkdir(request.targetDir, { recursive: true });
  const filePath = path.join(request.targetDir, `${uniqueStem(`ref_${provider}`)}.${extension}`);
  await downloadFile(mediaUrl, filePath, { timeoutMs });
  return { filePath, extension, provider, metadata };
}

/**
 * Remove every staging file whose name starts with the given stem
 * (finished files, .part and .ytdl leftovers alike).
 */
export async function removeStagedFiles(dir: string, stem: string): Promise<string[]> {
  let entries: string[];
  try {
    entries = await fs.readdir(dir);
  } catch {
    return [];
  }

  const removed: string[] = [];
  for (const entry of entries) {
    if (entry.startsWith(stem)) {
      await fs.rm(path.join(dir, entry), { force: true });
      removed.push(entry);
    }
  }
  return removed;
}

/** Extension of a URL path or filename, lower-cased, without the dot */
export function extensionOf(value: string | undefined): string | undefined {
  if (!value) return undefined;
  let pathname = value;
  try {
    pathname = new URL(value).pathname;
  } catch {
    // Not a URL; treat as a filename
  }
  const ext = path.extname(pathname).slice(1).toLowerCase();
  return /^[a-z0-9]{2,5}$/.test(ext) ? ext : undefined;
}
