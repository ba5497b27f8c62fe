import { describe, it, expect } from "vitest";
import { RandomizedStrategy, createStrategy } from "./strategies.js";

describe("createStrategy", () => {
  it("creates each named strategy", () => {
    const range = { min: 0, max: 0 };
    expect(createStrategy("browser", range).name).toBe("browser");
    expect(createStrategy("mobile-app", range).name).toBe("mobile-app");
    expect(createStrategy("randomized", range).name).toBe("randomized");
  });

  it("gives the browser identity no delay", () => {
    expect(createStrategy("browser", { min: 1_000, max: 2_000 }).delayBeforeAttemptMs()).toBe(0);
  });
});

describe("RandomizedStrategy", () => {
  it("scales the delay into the configured range", () => {
    expect(new RandomizedStrategy({ min: 1_500, max: 4_000 }, () => 0).delayBeforeAttemptMs()).toBe(1_500);
    expect(new RandomizedStrategy({ min: 1_500, max: 4_000 }, () => 0.5).delayBeforeAttemptMs()).toBe(2_750);
  });

  it("adds request sleeps and a user agent", () => {
    const args = new RandomizedStrategy({ min: 0, max: 0 }, () => 0.99).buildArgs();
    expect(args[0]).toBe("--user-agent");
    expect(args[1]).toContain("Android 14");
    expect(args.slice(2)).toEqual(["--sleep-requests", "1.5", "--sleep-interval", "2", "--max-sleep-interval", "5"]);
  });
});
