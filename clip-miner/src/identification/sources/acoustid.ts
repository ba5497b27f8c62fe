/**
 * AcoustID recognizer: Chromaprint fingerprint (fpcalc) + AcoustID lookup.
 */

import type { SignalSource, SignalContext } from "../types.js";
import type { AcoustIdConfig } from "../../config/types.js";
import type { CommandRunner } from "../../utils/exec.js";
import { getArray, getNumber, getRecord, getString, isRecord } from "../../utils/fields.js";
import { requestJson } from "../../utils/http.js";
import { composeLabel } from "../../output/label.js";

export interface Fingerprint {
  duration: number;
  fingerprint: string;
}

export class AcoustIdSource implements SignalSource {
  readonly name = "acoustid";
  readonly kind = "fingerprint";
  readonly requiresAudio = true;

  constructor(
    private readonly config: AcoustIdConfig,
    private readonly fpcalcPath: string,
    private readonly runner: CommandRunner,
    private readonly timeoutMs: number
  ) {}

  async identify(context: SignalContext): Promise<string | null> {
    const audioPath = context.normalizedPath ?? context.mediaPath;
    const fp = await this.fingerprint(audioPath);

    const payload = await requestJson(this.config.endpoint, {
      method: "POST",
      form: {
        client: this.config.apiKey,
        duration: String(Math.round(fp.duration)),
        fingerprint: fp.fingerprint,
        meta: "recordings",
        format: "json",
      },
      timeoutMs: this.timeoutMs,
    });

    return parseAcoustIdResponse(payload);
  }

  /** Run fpcalc and parse its JSON output */
  async fingerprint(audioPath: string): Promise<Fingerprint> {
    const { stdout } = await this.runner.run(this.fpcalcPath, ["-json", audioPath]);

    let parsed: unknown;
    try {
      parsed = JSON.parse(stdout);
    } catch {
      throw new Error(`Failed to parse fpcalc output: ${stdout.slice(0, 80)}`);
    }

    const duration = getNumber(parsed, "duration");
    const fingerprint = getString(parsed, "fingerprint");
    if (duration === undefined || !fingerprint) {
      throw new Error("fpcalc output has no fingerprint");
    }
    return { duration, fingerprint };
  }
}

/**
 * Best label from an AcoustID lookup response.
 * Results are tried in descending score; the first recording with a title
 * wins. Throws when the service reports an error (bad key, bad request).
 */
export function parseAcoustIdResponse(payload: unknown): string | null {
  if (getString(payload, "status") !== "ok") {
    const message = getString(getRecord(payload, "error"), "message") ?? "unknown error";
    throw new Error(`AcoustID refused the lookup: ${message}`);
  }

  const results = getArray(payload, "results")
    .filter(isRecord)
    .sort((a, b) => (getNumber(b, "score") ?? 0) - (getNumber(a, "score") ?? 0));

  for (const result of results) {
    for (const recording of getArray(result, "recordings")) {
      const title = getString(recording, "title");
      if (!title) continue;

      const artists = getArray(recording, "artists")
        .map((a) => getString(a, "name"))
        .filter((name): name is string => name !== undefined);

      return composeLabel(artists.length > 0 ? artists.join(", ") : undefined, title) ?? null;
    }
  }

  return null;
}
