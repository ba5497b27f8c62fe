import { describe, it, expect } from "vitest";
import { extractUrls, isKnownHost } from "./urls.js";

const domains = ["tiktok.com", "youtu.be", "instagram.com"];

describe("isKnownHost", () => {
  it("accepts the domain and its subdomains", () => {
    expect(isKnownHost("tiktok.com", domains)).toBe(true);
    expect(isKnownHost("vm.tiktok.com", domains)).toBe(true);
    expect(isKnownHost("WWW.Instagram.COM", domains)).toBe(true);
  });

  it("rejects lookalike hosts", () => {
    expect(isKnownHost("nottiktok.com", domains)).toBe(false);
    expect(isKnownHost("tiktok.com.example.org", domains)).toBe(false);
  });
});

describe("extractUrls", () => {
  it("extracts known URLs from chat text in order", () => {
    const text = [
      "[12:01] alice: check this https://vm.tiktok.com/ZM123abc/ so good",
      "[12:02] bob: (https://youtu.be/abc123) and https://example.com/ignored",
      "[12:03] alice: https://www.instagram.com/reel/XYZ/?igsh=1.",
    ].join("\n");

    expect(extractUrls(text, domains)).toEqual([
      "https://vm.tiktok.com/ZM123abc/",
      "https://youtu.be/abc123",
      "https://www.instagram.com/reel/XYZ/?igsh=1",
    ]);
  });

  it("keeps a closing bracket that belongs to the URL", () => {
    const text = "see https://en.wikipedia.org/wiki/Song_X_(film). or (https://en.wikipedia.org/wiki/Song_Y_(band))";
    expect(extractUrls(text, ["wikipedia.org"])).toEqual([
      "https://en.wikipedia.org/wiki/Song_X_(film)",
      "https://en.wikipedia.org/wiki/Song_Y_(band)",
    ]);
  });

  it("drops duplicates keeping the first occurrence", () => {
    const text = "https://youtu.be/a https://youtu.be/b https://youtu.be/a!";
    expect(extractUrls(text, domains)).toEqual(["https://youtu.be/a", "https://youtu.be/b"]);
  });

  it("returns nothing when no URL matches", () => {
    expect(extractUrls("no links here, just www.tiktok.com", domains)).toEqual([]);
  });
});
