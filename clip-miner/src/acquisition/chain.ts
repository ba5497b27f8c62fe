/**
 * Cascading acquisition: tries providers in tier order until one succeeds.
 */

import type {
  AcquisitionProvider,
  AcquisitionRequest,
  AcquisitionAttempt,
  AcquisitionOutcome,
  ChainOutcome,
  ProviderTier,
} from "./types.js";
import { describeError } from "../errors.js";
import { logger } from "../utils/logger.js";

const TIER_ORDER: Record<ProviderTier, number> = {
  platform: 0,
  universal: 1,
  native: 2,
};

/**
 * Ordered fallback over acquisition providers.
 *
 * Providers are sorted by tier (registration order within a tier) and tried
 * one at a time, each at most once per request. A provider that does not
 * support the URL's host is skipped without cost.
 */
export class AcquisitionChain {
  private providers: AcquisitionProvider[] = [];

  registerProvider(provider: AcquisitionProvider): void {
    this.providers.push(provider);
    // Stable sort keeps registration order inside a tier
    this.providers.sort((a, b) => TIER_ORDER[a.tier] - TIER_ORDER[b.tier]);
    logger.debug(`Registered provider: ${provider.name} (${provider.tier})`);
  }

  registerProviders(providers: AcquisitionProvider[]): void {
    providers.forEach((p) => this.registerProvider(p));
  }

  getProviderNames(): string[] {
    return this.providers.map((p) => p.name);
  }

  /**
   * Acquire the request's URL through the first provider that succeeds.
   */
  async acquire(request: AcquisitionRequest): Promise<ChainOutcome> {
    const attempts: AcquisitionAttempt[] = [];

    let url: URL;
    try {
      url = new URL(request.url);
    } catch {
      return {
        ok: false,
        failure: {
          kind: "ProviderFailure",
          provider: "acquisition-chain",
          reason: `Not a valid URL: ${request.url}`,
        },
        attempts,
      };
    }

    for (const provider of this.providers) {
      if (!provider.supports(url)) {
        attempts.push({ provider: provider.name, tier: provider.tier, status: "skipped" });
        logger.debug(`- ${provider.name}: does not handle ${url.hostname}`);
        continue;
      }

      logger.debug(`Trying ${provider.name} for ${request.url}`);
      const outcome = await this.attempt(provider, request);

      if (outcome.ok) {
        attempts.push({ provider: provider.name, tier: provider.tier, status: "success" });
        logger.success(`${provider.name}: acquired ${outcome.result.extension} reference`);
        return { ...outcome, attempts };
      }

      attempts.push({
        provider: provider.name,
        tier: provider.tier,
        status: "failed",
        reason: outcome.failure.reason,
      });
      logger.warn(`✗ ${provider.name}: ${outcome.failure.reason}`);
    }

    const tried = attempts.filter((a) => a.status === "failed");
    const reason =
      tried.length === 0
        ? `No provider available for ${url.hostname}`
        : `All ${tried.length} provider(s) failed: ${tried.map((a) => `${a.provider}: ${a.reason}`).join("; ")}`;

    return {
      ok: false,
      failure: { kind: "ProviderFailure", provider: "acquisition-chain", reason },
      attempts,
    };
  }

  /**
   * Run one provider. A provider that breaks its contract by rejecting is
   * recorded as a failure like any other.
   */
  private async attempt(
    provider: AcquisitionProvider,
    request: AcquisitionRequest
  ): Promise<AcquisitionOutcome> {
    try {
      return await provider.acquire(request);
    } catch (error) {
      return {
        ok: false,
        failure: { kind: "ProviderFailure", provider: provider.name, reason: describeError(error) },
      };
    }
  }
}
