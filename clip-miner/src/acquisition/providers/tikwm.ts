/**
 * TikWM relay: TikTok-only, fast, and returns the sound's own title/author.
 */

import type {
  AcquisitionProvider,
  AcquisitionRequest,
  AcquisitionOutcome,
  PlatformMetadata,
} from "../types.js";
import { providerFailure } from "../types.js";
import type { TikwmConfig } from "../../config/types.js";
import { getArray, getNumber, getRecord, getString } from "../../utils/fields.js";
import type { JsonRecord } from "../../utils/fields.js";
import { requestJson } from "../../utils/http.js";
import { describeError } from "../../errors.js";
import { stageRemoteMedia } from "./staging.js";

export class TikwmProvider implements AcquisitionProvider {
  readonly name = "tikwm";
  readonly tier = "platform";

  constructor(
    private readonly config: TikwmConfig,
    private readonly timeoutMs: number
  ) {}

  supports(url: URL): boolean {
    const host = url.hostname.toLowerCase();
    return host === "tiktok.com" || host.endsWith(".tiktok.com");
  }

  async acquire(request: AcquisitionRequest): Promise<AcquisitionOutcome> {
    let payload: unknown;
    try {
      payload = await requestJson(this.config.endpoint, {
        method: "POST",
        form: { url: request.url, hd: "1" },
        timeoutMs: this.timeoutMs,
      });
    } catch (error) {
      return providerFailure(this.name, describeError(error));
    }

    const code = getNumber(payload, "code");
    const data = getRecord(payload, "data");
    if (code !== 0 || !data) {
      const msg = getString(payload, "msg") ?? `code ${code ?? "missing"}`;
      return providerFailure(this.name, `Relay refused: ${msg}`);
    }

    const media = this.pickMedia(data, request);
    if (!media) {
      return providerFailure(this.name, "Response has no media URL");
    }

    try {
      const result = await stageRemoteMedia(
        this.name,
        this.resolve(media.url),
        media.extension,
        request,
        this.timeoutMs,
        parseTikwmMetadata(data)
      );
      return { ok: true, result };
    } catch (error) {
      return providerFailure(this.name, `Media download failed: ${describeError(error)}`);
    }
  }

  /**
   * Video for audio+video requests; the sound track for audio requests,
   * slideshow posts and posts without a playable video.
   */
  private pickMedia(
    data: JsonRecord,
    request: AcquisitionRequest
  ): { url: string; extension: string } | undefined {
    const isSlideshow = getArray(data, "images").length > 0;
    const video = getString(data, "hdplay") ?? getString(data, "play");
    const audio = getString(data, "music") ?? getString(getRecord(data, "music_info"), "play");

    if (request.mediaKind === "audio+video" && video && !isSlideshow) {
      return { url: video, extension: "mp4" };
    }
    if (audio) {
      return { url: audio, extension: "mp3" };
    }
    if (video && !isSlideshow) {
      return { url: video, extension: "mp4" };
    }
    return undefined;
  }

  /** Media URLs are sometimes relative to the relay host */
  private resolve(mediaUrl: string): string {
    return new URL(mediaUrl, this.config.endpoint).toString();
  }
}

/**
 * Map the relay's data block to PlatformMetadata.
 * music_info describes the sound; title/author describe the post.
 */
export function parseTikwmMetadata(data: JsonRecord): PlatformMetadata {
  const music = getRecord(data, "music_info");
  return {
    provider: "tikwm",
    title: getString(music, "title"),
    author: getString(music, "author"),
    secondaryTitle: getString(data, "title"),
    secondaryAuthor: getString(getRecord(data, "author"), "nickname"),
  };
}
