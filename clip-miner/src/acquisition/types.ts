/**
 * Types for the acquisition chain and its providers.
 */

import type { MediaKind } from "../config/types.js";

/** One acquisition job; created once per batch item */
export interface AcquisitionRequest {
  readonly url: string;
  /** Staging directory the provider writes into */
  readonly targetDir: string;
  readonly mediaKind: MediaKind;
}

/**
 * Metadata a platform reported about the clip.
 * title/author describe the music where the platform knows it; the
 * secondary pair is the post caption and uploader.
 */
export interface PlatformMetadata {
  provider: string;
  title?: string;
  author?: string;
  secondaryTitle?: string;
  secondaryAuthor?: string;
}

/** A successfully acquired reference file. The caller owns filePath. */
export interface AcquisitionResult {
  filePath: string;
  /** Extension without the dot, e.g. "mp4" */
  extension: string;
  provider: string;
  metadata?: PlatformMetadata;
}

export interface ProviderFailure {
  kind: "ProviderFailure";
  provider: string;
  reason: string;
}

export type AcquisitionOutcome =
  | { ok: true; result: AcquisitionResult }
  | { ok: false; failure: ProviderFailure };

/**
 * Fallback tiers in the order they are paid for:
 * platform relays, then the universal relay, then the native extractor.
 */
export type ProviderTier = "platform" | "universal" | "native";

/**
 * A single acquisition channel.
 * acquire() never rejects: every error comes back as a ProviderFailure.
 */
export interface AcquisitionProvider {
  readonly name: string;
  readonly tier: ProviderTier;

  /** Whether this provider can handle the URL at all */
  supports(url: URL): boolean;

  acquire(request: AcquisitionRequest): Promise<AcquisitionOutcome>;
}

export type AttemptStatus = "success" | "failed" | "skipped";

export interface AcquisitionAttempt {
  provider: string;
  tier: ProviderTier;
  status: AttemptStatus;
  reason?: string;
}

export type ChainOutcome = AcquisitionOutcome & { attempts: AcquisitionAttempt[] };

/** Build a failure value */
export function providerFailure(provider: string, reason: string): AcquisitionOutcome {
  return { ok: false, failure: { kind: "ProviderFailure", provider, reason } };
}
