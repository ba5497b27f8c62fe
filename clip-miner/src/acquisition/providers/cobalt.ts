/**
 * Cobalt relay: handles most platforms but reports no track metadata.
 */

import type { AcquisitionProvider, AcquisitionRequest, AcquisitionOutcome } from "../types.js";
import { providerFailure } from "../types.js";
import type { CobaltConfig } from "../../config/types.js";
import { getArray, getRecord, getString, isRecord } from "../../utils/fields.js";
import { requestJson } from "../../utils/http.js";
import { describeError } from "../../errors.js";
import { extensionOf, stageRemoteMedia } from "./staging.js";

/** Response statuses that carry a direct media URL */
const DIRECT_STATUSES = new Set(["tunnel", "redirect", "stream", "success"]);

export class CobaltProvider implements AcquisitionProvider {
  readonly name = "cobalt";
  readonly tier = "universal";

  constructor(
    private readonly config: CobaltConfig,
    private readonly timeoutMs: number
  ) {}

  supports(url: URL): boolean {
    return url.protocol === "https:" || url.protocol === "http:";
  }

  async acquire(request: AcquisitionRequest): Promise<AcquisitionOutcome> {
    const headers: Record<string, string> = { Accept: "application/json" };
    if (this.config.apiKey) {
      headers.Authorization = `Api-Key ${this.config.apiKey}`;
    }

    let payload: unknown;
    try {
      payload = await requestJson(this.config.endpoint, {
        method: "POST",
        headers,
        json: {
          url: request.url,
          downloadMode: request.mediaKind === "audio" ? "audio" : "auto",
          audioFormat: "mp3",
          filenameStyle: "basic",
        },
        timeoutMs: this.timeoutMs,
      });
    } catch (error) {
      return providerFailure(this.name, describeError(error));
    }

    const media = parseCobaltMedia(payload, request.mediaKind === "audio" ? "mp3" : "mp4");
    if ("error" in media) {
      return providerFailure(this.name, media.error);
    }

    try {
      const result = await stageRemoteMedia(
        this.name,
        media.url,
        media.extension,
        request,
        this.timeoutMs
      );
      return { ok: true, result };
    } catch (error) {
      return providerFailure(this.name, `Media download failed: ${describeError(error)}`);
    }
  }
}

/**
 * Pull the media URL out of a cobalt response.
 * The extension comes from the suggested filename, then the URL path, then
 * the fallback for the requested media kind.
 */
export function parseCobaltMedia(
  payload: unknown,
  fallbackExtension: string
): { url: string; extension: string } | { error: string } {
  const status = getString(payload, "status");

  if (status === "error") {
    const code = getString(getRecord(payload, "error"), "code") ?? getString(payload, "text");
    return { error: `Relay error: ${code ?? "unknown"}` };
  }

  let url: string | undefined;
  if (status === "picker") {
    url = getString(payload, "audio");
    if (!url) {
      const first = getArray(payload, "picker").find(isRecord);
      url = getString(first, "url");
    }
  } else if (status === undefined || DIRECT_STATUSES.has(status)) {
    url = getString(payload, "url");
  }

  if (!url) {
    return { error: `Response has no media URL (status ${status ?? "missing"})` };
  }

  const extension =
    extensionOf(getString(payload, "filename")) ?? extensionOf(url) ?? fallbackExtension;
  return { url, extension };
}
