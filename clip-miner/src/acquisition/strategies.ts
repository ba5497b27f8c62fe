/**
 * Client-identity strategies for the native extractor.
 * They differ only in how yt-dlp presents itself to the platform.
 */

import type { NativeStrategyName } from "../config/types.js";

export interface NativeStrategy {
  readonly name: NativeStrategyName;
  readonly description: string;
  /** Extra yt-dlp arguments for this identity */
  buildArgs(): string[];
  /** Milliseconds to wait before the attempt starts */
  delayBeforeAttemptMs(): number;
}

const DESKTOP_CHROME =
  "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0.0.0 Safari/537.36";

const RANDOM_USER_AGENTS = [
  DESKTOP_CHROME,
  "Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/605.1.15 (KHTML, like Gecko) Version/17.4 Safari/605.1.15",
  "Mozilla/5.0 (X11; Linux x86_64; rv:125.0) Gecko/20100101 Firefox/125.0",
  "Mozilla/5.0 (Windows NT 10.0; Win64; x64; rv:125.0) Gecko/20100101 Firefox/125.0",
  "Mozilla/5.0 (iPhone; CPU iPhone OS 17_4 like Mac OS X) AppleWebKit/605.1.15 (KHTML, like Gecko) Version/17.4 Mobile/15E148 Safari/604.1",
  "Mozilla/5.0 (Linux; Android 14; Pixel 8) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0.0.0 Mobile Safari/537.36",
];

/** Standard desktop browser identity */
export class BrowserStrategy implements NativeStrategy {
  readonly name = "browser";
  readonly description = "Desktop browser identity";

  buildArgs(): string[] {
    return ["--user-agent", DESKTOP_CHROME];
  }

  delayBeforeAttemptMs(): number {
    return 0;
  }
}

/** Emulates the platforms' Android app clients */
export class MobileAppStrategy implements NativeStrategy {
  readonly name = "mobile-app";
  readonly description = "Android app client emulation";

  buildArgs(): string[] {
    return [
      "--extractor-args",
      "tiktok:app_version=30.0.0;os=android",
      "--extractor-args",
      "youtube:player_client=android,web",
    ];
  }

  delayBeforeAttemptMs(): number {
    return 0;
  }
}

/**
 * Random user agent, a random pause before starting and sleeps between the
 * extractor's own requests. Slowest, so it runs last.
 */
export class RandomizedStrategy implements NativeStrategy {
  readonly name = "randomized";
  readonly description = "Randomized identity with request delays";

  constructor(
    private readonly delayRange: { min: number; max: number },
    private readonly random: () => number = Math.random
  ) {}

  buildArgs(): string[] {
    const index = Math.floor(this.random() * RANDOM_USER_AGENTS.length);
    const userAgent = RANDOM_USER_AGENTS[Math.min(index, RANDOM_USER_AGENTS.length - 1)];
    return ["--user-agent", userAgent, "--sleep-requests", "1.5", "--sleep-interval", "2", "--max-sleep-interval", "5"];
  }

  delayBeforeAttemptMs(): number {
    const { min, max } = this.delayRange;
    return Math.round(min + this.random() * (max - min));
  }
}

export function createStrategy(
  name: NativeStrategyName,
  delayRange: { min: number; max: number }
): NativeStrategy {
  switch (name) {
    case "browser":
      return new BrowserStrategy();
    case "mobile-app":
      return new MobileAppStrategy();
    case "randomized":
      return new RandomizedStrategy(delayRange);
  }
}
