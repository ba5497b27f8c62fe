import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";
import {
  appendBatchReport,
  appendErrorLog,
  formatErrorLine,
  generateReportContent,
  writeItemReport,
} from "./report.js";
import type { BatchItemReport } from "../batch/types.js";
import { FatalIOError } from "../errors.js";

const GENERATED = new Date("2026-01-02T03:04:05.000Z");

const doneReport: BatchItemReport = {
  index: 7,
  url: "https://www.tiktok.com/@user/video/123",
  stage: "DONE",
  outcome: "success",
  acquisition: {
    provider: "tikwm",
    attempts: [{ provider: "tikwm", tier: "platform", status: "success" }],
    probe: { durationSeconds: 14, container: "MPEG-4", codec: "AAC" },
  },
  signals: [
    { source: "audd", kind: "fingerprint", present: true, label: "Artist A - Song X" },
    { source: "acoustid", kind: "fingerprint", present: false, reason: "HTTP 503 Service Unavailable" },
    { source: "platform-metadata", kind: "metadata", present: false },
  ],
  verdict: { status: "SINGLE_SOURCE", winningLabel: "Artist A - Song X", winningSource: "audd", agreements: [] },
  master: {
    status: "DOWNLOADED",
    query: "Artist A - Song X official audio",
    candidate: { url: "https://www.youtube.com/watch?v=a", title: "Song X", durationSeconds: 200 },
    filePath: "/out/007_Artist A - Song X/Artist A - Song X.mp3",
    tagged: true,
  },
  files: {
    itemDir: "/out/007_Artist A - Song X",
    reference: "/out/007_Artist A - Song X/reference.mp4",
    master: "/out/007_Artist A - Song X/Artist A - Song X.mp3",
  },
  issues: [{ kind: "RecognitionFailure", message: "acoustid: HTTP 503 Service Unavailable" }],
};

describe("generateReportContent", () => {
  it("renders every section of a finished item", () => {
    expect(generateReportContent(doneReport, GENERATED).split("\n")).toEqual([
      "# Clip Report 007",
      "",
      "Generated: 2026-01-02T03:04:05.000Z",
      "",
      "## Source",
      "",
      "- **URL:** https://www.tiktok.com/@user/video/123",
      "- **Provider:** tikwm",
      "- **Duration:** 14.0s",
      "- **Format:** MPEG-4 / AAC",
      "",
      "## Signals",
      "",
      "| Source | Kind | Result |",
      "|---|---|---|",
      "| audd | fingerprint | Artist A - Song X |",
      "| acoustid | fingerprint | No Result (HTTP 503 Service Unavailable) |",
      "| platform-metadata | metadata | No Result |",
      "",
      "## Verdict",
      "",
      "- **Status:** SINGLE_SOURCE",
      "- **Winning Label:** Artist A - Song X",
      "- **Winning Source:** audd",
      "",
      "## Master",
      "",
      "- **Status:** DOWNLOADED",
      "- **Query:** Artist A - Song X official audio",
      "- **Candidate:** Song X (200s)",
      "- **URL:** https://www.youtube.com/watch?v=a",
      "- **Tagged:** yes",
      "",
      "## Issues",
      "",
      "- **RecognitionFailure:** acoustid: HTTP 503 Service Unavailable",
      "",
      "## Files",
      "",
      "- **Reference:** reference.mp4",
      "- **Master:** Artist A - Song X.mp3",
      "",
    ]);
  });

  it("lists pair scores and the failure", () => {
    const report: BatchItemReport = {
      index: 2,
      url: "https://www.tiktok.com/@user/video/456",
      stage: "FAILED",
      outcome: "failed",
      signals: [],
      verdict: {
        status: "CONFLICT",
        winningLabel: "Zed - Night Train",
        winningSource: "audd",
        agreements: [{ a: "audd", b: "platform-metadata", score: 31, agrees: false }],
      },
      files: {},
      issues: [],
      failure: { kind: "InternalError", stage: "RESOLVING_MASTER", reason: "boom" },
    };

    const content = generateReportContent(report, GENERATED);

    expect(content).toContain("| Pair | Score | Agrees |\n|---|---|---|\n| audd ~ platform-metadata | 31 | no |\n");
    expect(content).toContain(
      "## Failure\n\n- **Kind:** InternalError\n- **Stage:** RESOLVING_MASTER\n- **Reason:** boom\n"
    );
  });

  it("describes skipped and missing masters", () => {
    const skipped = generateReportContent(
      { ...doneReport, master: { status: "SKIPPED", reason: "Verdict is CONFLICT" } },
      GENERATED
    );
    expect(skipped).toContain("- **Status:** SKIPPED (Verdict is CONFLICT)\n");

    const missing = generateReportContent(
      { ...doneReport, master: { status: "NOT_FOUND", query: "q", candidates: 5 } },
      GENERATED
    );
    expect(missing).toContain("- **Status:** NOT_FOUND\n- **Query:** q\n- **Candidates Checked:** 5\n");
  });
});

describe("formatErrorLine", () => {
  it("joins url, stage, kind and a single-line reason", () => {
    expect(
      formatErrorLine("https://www.tiktok.com/@user/video/1", {
        kind: "ProviderFailure",
        stage: "ACQUIRING",
        reason: "All 2 provider(s) failed:\ntikwm: HTTP 404",
      })
    ).toBe("https://www.tiktok.com/@user/video/1 | ACQUIRING | ProviderFailure: All 2 provider(s) failed: tikwm: HTTP 404");
  });
});

describe("report files", () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), "clip-miner-report-"));
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it("appends error lines, creating the directory", async () => {
    const logPath = path.join(tempDir, "logs", "error_log.txt");
    await appendErrorLog(logPath, "https://a", { kind: "Stopped", stage: "PENDING", reason: "stopped" });
    await appendErrorLog(logPath, "https://b", { kind: "FatalIOFailure", stage: "IDENTIFYING", reason: "disk full" });

    expect(await fs.readFile(logPath, "utf-8")).toBe(
      "https://a | PENDING | Stopped: stopped\nhttps://b | IDENTIFYING | FatalIOFailure: disk full\n"
    );
  });

  it("appends one JSON line per item", async () => {
    const reportPath = path.join(tempDir, "batch-report.jsonl");
    await appendBatchReport(reportPath, doneReport);
    await appendBatchReport(reportPath, { ...doneReport, index: 8 });

    const lines = (await fs.readFile(reportPath, "utf-8")).trim().split("\n");
    expect(lines.map((l) => JSON.parse(l).index)).toEqual([7, 8]);
  });

  it("writes report.md and wraps write errors", async () => {
    const written = await writeItemReport(tempDir, "# Clip Report 001\n");
    expect(written).toBe(path.join(tempDir, "report.md"));
    expect(await fs.readFile(written, "utf-8")).toBe("# Clip Report 001\n");

    await expect(writeItemReport(path.join(tempDir, "missing"), "x")).rejects.toBeInstanceOf(FatalIOError);
  });
});
