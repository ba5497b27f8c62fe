import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import * as fs from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";
import { TikwmProvider, parseTikwmMetadata } from "./tikwm.js";
import type { AcquisitionRequest } from "../types.js";

const ENDPOINT = "https://www.tikwm.com/api/";
const CLIP_URL = "https://www.tiktok.com/@user/video/123";

const fetchMock = vi.fn<[string | URL | Request, RequestInit?], Promise<Response>>();

function respond(relay: unknown, media: Response = new Response(new Uint8Array([1, 2, 3]))) {
  fetchMock.mockImplementation(async (input) => {
    if (String(input) === ENDPOINT) {
      return new Response(JSON.stringify(relay));
    }
    return media;
  });
}

describe("TikwmProvider", () => {
  let stagingDir: string;
  let request: AcquisitionRequest;
  const provider = new TikwmProvider({ enabled: true, endpoint: ENDPOINT }, 5_000);

  beforeEach(async () => {
    stagingDir = await fs.mkdtemp(path.join(os.tmpdir(), "clip-miner-tikwm-"));
    request = { url: CLIP_URL, targetDir: stagingDir, mediaKind: "audio+video" };
    fetchMock.mockReset();
    vi.stubGlobal("fetch", fetchMock);
  });

  afterEach(async () => {
    vi.unstubAllGlobals();
    await fs.rm(stagingDir, { recursive: true, force: true });
  });

  it("only supports TikTok hosts", () => {
    expect(provider.supports(new URL(CLIP_URL))).toBe(true);
    expect(provider.supports(new URL("https://vm.tiktok.com/ZM1/"))).toBe(true);
    expect(provider.supports(new URL("https://youtu.be/abc"))).toBe(false);
  });

  it("posts the clip URL as a form and stages the video", async () => {
    respond({
      code: 0,
      data: {
        play: "https://cdn.example.com/v/abc.mp4",
        music: "https://cdn.example.com/a/abc.mp3",
        title: "dance #fyp",
        author: { nickname: "dancer" },
        music_info: { title: "Song X", author: "Artist A" },
      },
    });

    const outcome = await provider.acquire(request);

    expect(fetchMock.mock.calls[0][1]?.body).toBe(
      "url=https%3A%2F%2Fwww.tiktok.com%2F%40user%2Fvideo%2F123&hd=1"
    );
    expect(String(fetchMock.mock.calls[1][0])).toBe("https://cdn.example.com/v/abc.mp4");
    expect(outcome.ok).toBe(true);
    if (outcome.ok) {
      expect(outcome.result.extension).toBe("mp4");
      expect(outcome.result.provider).toBe("tikwm");
      expect(path.basename(outcome.result.filePath)).toMatch(/^ref_tikwm_\d+_[0-9a-f]{6}\.mp4$/);
      expect((await fs.readFile(outcome.result.filePath)).length).toBe(3);
      expect(outcome.result.metadata).toEqual({
        provider: "tikwm",
        title: "Song X",
        author: "Artist A",
        secondaryTitle: "dance #fyp",
        secondaryAuthor: "dancer",
      });
    }
  });

  it("takes the sound track for slideshow posts", async () => {
    respond({
      code: 0,
      data: {
        play: "https://cdn.example.com/v/abc.mp4",
        music: "https://cdn.example.com/a/abc.mp3",
        images: ["https://cdn.example.com/i/1.jpg"],
      },
    });

    const outcome = await provider.acquire(request);

    expect(String(fetchMock.mock.calls[1][0])).toBe("https://cdn.example.com/a/abc.mp3");
    expect(outcome.ok && outcome.result.extension).toBe("mp3");
  });

  it("takes the sound track for audio requests", async () => {
    respond({
      code: 0,
      data: { play: "https://cdn.example.com/v/abc.mp4", music: "https://cdn.example.com/a/abc.mp3" },
    });

    const outcome = await provider.acquire({ ...request, mediaKind: "audio" });

    expect(outcome.ok && outcome.result.extension).toBe("mp3");
  });

  it("resolves relative media URLs against the endpoint", async () => {
    respond({ code: 0, data: { play: "/video/media/play/abc.mp4" } });

    await provider.acquire(request);

    expect(String(fetchMock.mock.calls[1][0])).toBe("https://www.tikwm.com/video/media/play/abc.mp4");
  });

  it("fails when the relay refuses", async () => {
    respond({ code: -1, msg: "Url parsing is failed!" });

    const outcome = await provider.acquire(request);

    expect(outcome).toEqual({
      ok: false,
      failure: { kind: "ProviderFailure", provider: "tikwm", reason: "Relay refused: Url parsing is failed!" },
    });
  });

  it("fails when the response has no media", async () => {
    respond({ code: 0, data: { title: "nothing to play" } });

    const outcome = await provider.acquire(request);

    expect(!outcome.ok && outcome.failure.reason).toBe("Response has no media URL");
  });

  it("leaves no partial file when the media download fails", async () => {
    respond(
      { code: 0, data: { play: "https://cdn.example.com/v/abc.mp4" } },
      new Response("gone", { status: 404, statusText: "Not Found" })
    );

    const outcome = await provider.acquire(request);

    expect(!outcome.ok && outcome.failure.reason).toBe(
      "Media download failed: HTTP 404 Not Found from https://cdn.example.com/v/abc.mp4"
    );
    expect(await fs.readdir(stagingDir)).toEqual([]);
  });

  it("turns transport errors into failures", async () => {
    fetchMock.mockRejectedValue(new Error("getaddrinfo ENOTFOUND www.tikwm.com"));

    const outcome = await provider.acquire(request);

    expect(!outcome.ok && outcome.failure.reason).toBe("getaddrinfo ENOTFOUND www.tikwm.com");
  });
});

describe("parseTikwmMetadata", () => {
  it("leaves missing fields undefined", () => {
    expect(parseTikwmMetadata({ title: "caption only" })).toEqual({
      provider: "tikwm",
      title: undefined,
      author: undefined,
      secondaryTitle: "caption only",
      secondaryAuthor: undefined,
    });
  });
});
