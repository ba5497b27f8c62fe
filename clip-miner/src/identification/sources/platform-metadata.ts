import type { SignalSource, SignalContext } from "../types.js";
import type { PlatformMetadata } from "../../acquisition/types.js";
import { composeLabel } from "../../output/label.js";

/**
 * Uses what the acquisition provider reported about the clip.
 * The music fields win; the post caption/uploader are the fallback.
 */
export class PlatformMetadataSource implements SignalSource {
  readonly name = "platform-metadata";
  readonly kind = "metadata";
  readonly requiresAudio = false;

  async identify(context: SignalContext): Promise<string | null> {
    if (!context.metadata) {
      return null;
    }
    return metadataLabel(context.metadata) ?? null;
  }
}

/**
 * "author - title", each part taken from the music fields first and the
 * post fields second. A title alone is used; an author alone says nothing
 * about the track.
 */
export function metadataLabel(metadata: PlatformMetadata): string | undefined {
  const title = metadata.title ?? metadata.secondaryTitle;
  if (!title) {
    return undefined;
  }
  const author = metadata.author ?? metadata.secondaryAuthor;
  return composeLabel(author, title);
}
