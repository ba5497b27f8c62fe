/**
 * Types for the identification signal sources.
 */

import type { PlatformMetadata } from "../acquisition/types.js";

/** Fingerprint recognizers outrank platform metadata in every tie-break */
export type SignalKind = "fingerprint" | "metadata";

/**
 * One source's opinion of the track's identity.
 * An absent signal is "no opinion", never disagreement.
 */
export type IdentitySignal =
  | {
      source: string;
      kind: SignalKind;
      present: true;
      /** Cleaned "Artist - Title" label */
      label: string;
    }
  | {
      source: string;
      kind: SignalKind;
      present: false;
      /** Why the source failed, when it failed rather than found nothing */
      reason?: string;
    };

export type PresentSignal = Extract<IdentitySignal, { present: true }>;

/**
 * Context provided to all signal sources.
 */
export interface SignalContext {
  /** Acquired reference file, as downloaded */
  mediaPath: string;

  /** Mono PCM WAV of the reference, when normalization succeeded */
  normalizedPath?: string;

  /** Metadata reported by the acquisition provider */
  metadata?: PlatformMetadata;
}

/**
 * A technique that produces at most one identity for a clip.
 */
export interface SignalSource {
  /** Source name (e.g., "audd", "platform-metadata") */
  readonly name: string;

  readonly kind: SignalKind;

  /** Whether this source needs the normalized audio */
  readonly requiresAudio: boolean;

  /**
   * Attempt to identify the clip.
   * @returns Raw "Artist - Title" label, or null when the source has no opinion
   */
  identify(context: SignalContext): Promise<string | null>;
}

export function isPresent(signal: IdentitySignal): signal is PresentSignal {
  return signal.present;
}
