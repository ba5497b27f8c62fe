/**
 * AudD recognizer: uploads the clip and gets the matching release back.
 */

import * as fs from "node:fs/promises";
import * as path from "node:path";
import type { SignalSource, SignalContext } from "../types.js";
import type { AuddConfig } from "../../config/types.js";
import { getRecord, getString } from "../../utils/fields.js";
import { requestJson } from "../../utils/http.js";
import { composeLabel } from "../../output/label.js";

export class AuddSource implements SignalSource {
  readonly name = "audd";
  readonly kind = "fingerprint";
  readonly requiresAudio = true;

  constructor(
    private readonly config: AuddConfig,
    private readonly timeoutMs: number
  ) {}

  async identify(context: SignalContext): Promise<string | null> {
    const audioPath = context.normalizedPath ?? context.mediaPath;
    const content = await fs.readFile(audioPath);

    const form = new FormData();
    form.append("file", new Blob([new Uint8Array(content)]), path.basename(audioPath));
    form.append("return", "");
    if (this.config.apiToken) {
      form.append("api_token", this.config.apiToken);
    }

    const payload = await requestJson(this.config.endpoint, {
      method: "POST",
      multipart: form,
      timeoutMs: this.timeoutMs,
    });

    return parseAuddResponse(payload);
  }
}

/**
 * Label from an AudD response. A null result is "no match"; an error status
 * throws so the collector records why the source failed.
 */
export function parseAuddResponse(payload: unknown): string | null {
  const status = getString(payload, "status");
  if (status !== "success") {
    const message = getString(getRecord(payload, "error"), "error_message") ?? `status ${status ?? "missing"}`;
    throw new Error(`AudD refused the request: ${message}`);
  }

  const result = getRecord(payload, "result");
  const title = getString(result, "title");
  if (!title) {
    return null;
  }
  return composeLabel(getString(result, "artist"), title) ?? null;
}
