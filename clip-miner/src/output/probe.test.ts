import { describe, it, expect, vi, beforeEach } from "vitest";
import { parseFile } from "music-metadata";
import { probeMedia } from "./probe.js";

vi.mock("music-metadata", () => ({
  parseFile: vi.fn(),
}));

const mockParseFile = vi.mocked(parseFile);

describe("probeMedia", () => {
  beforeEach(() => {
    mockParseFile.mockReset();
  });

  it("reads duration, container and codec", async () => {
    mockParseFile.mockResolvedValue({
      format: { duration: 14.5, container: "isom/iso2/avc1/mp41", codec: "MPEG-4/AAC" },
    } as Awaited<ReturnType<typeof parseFile>>);

    expect(await probeMedia("/staging/clip.mp4")).toEqual({
      durationSeconds: 14.5,
      container: "isom/iso2/avc1/mp41",
      codec: "MPEG-4/AAC",
    });
    expect(mockParseFile).toHaveBeenCalledWith("/staging/clip.mp4", { duration: true, skipCovers: true });
  });

  it("returns undefined for an unreadable file", async () => {
    mockParseFile.mockRejectedValue(new Error("Unsupported file type"));

    expect(await probeMedia("/staging/clip.bin")).toBeUndefined();
  });
});
