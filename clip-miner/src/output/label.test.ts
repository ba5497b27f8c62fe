import { describe, it, expect } from "vitest";
import { cleanLabel, sanitizeFilename, composeLabel, splitLabel } from "./label.js";

describe("cleanLabel", () => {
  it("removes parenthesized annotations", () => {
    expect(cleanLabel("Artist A - Song X (Official Video)")).toBe("Artist A - Song X");
  });

  it("removes hashtags, mentions and bracketed text", () => {
    expect(cleanLabel("#fyp Song X @someone [HD]")).toBe("Song X");
  });

  it("drops emoji and symbols", () => {
    expect(cleanLabel("Song X 🔥🔥 | Artist A")).toBe("Song X Artist A");
  });

  it("keeps letters outside ASCII", () => {
    expect(cleanLabel("Beyoncé - Déjà Vu")).toBe("Beyoncé - Déjà Vu");
  });

  it("collapses whitespace and trims separators", () => {
    expect(cleanLabel("  - Artist   A  -  Song  -  ")).toBe("Artist A - Song");
  });

  it("returns empty for a label made only of annotations", () => {
    expect(cleanLabel("#viral (sped up) [4K]")).toBe("");
  });
});

describe("sanitizeFilename", () => {
  it("removes characters illegal on common filesystems", () => {
    expect(sanitizeFilename('AC/DC: "Back" <In> Black?')).toBe("ACDC Back In Black");
  });

  it("removes trailing dots and spaces", () => {
    expect(sanitizeFilename("Song...  ")).toBe("Song");
  });

  it("caps the length", () => {
    expect(sanitizeFilename("a".repeat(200))).toHaveLength(120);
  });

  it("counts the cap in characters, not UTF-16 units", () => {
    expect(sanitizeFilename(`a${"𝄞".repeat(200)}`)).toBe(`a${"𝄞".repeat(119)}`);
  });

  it("falls back to untitled", () => {
    expect(sanitizeFilename("???")).toBe("untitled");
  });
});

describe("composeLabel", () => {
  it("joins artist and title", () => {
    expect(composeLabel("Artist A", "Song X")).toBe("Artist A - Song X");
  });

  it("returns the part that is present", () => {
    expect(composeLabel(undefined, "Song X")).toBe("Song X");
    expect(composeLabel("Artist A", undefined)).toBe("Artist A");
    expect(composeLabel(undefined, undefined)).toBeUndefined();
  });
});

describe("splitLabel", () => {
  it("splits at the first separator", () => {
    expect(splitLabel("Artist A - Song X - Remix")).toEqual({ artist: "Artist A", title: "Song X - Remix" });
  });

  it("treats a label without separator as a title", () => {
    expect(splitLabel("Song X")).toEqual({ title: "Song X" });
  });
});
