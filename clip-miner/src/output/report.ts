import * as fs from "node:fs/promises";
import * as path from "node:path";
import type { BatchItemReport, ItemFailure } from "../batch/types.js";
import type { MasterOutcome } from "../master/types.js";
import { FatalIOError } from "../errors.js";

export const ITEM_REPORT_NAME = "report.md";
export const BATCH_REPORT_NAME = "batch-report.jsonl";

/**
 * Generate the per-item markdown report.
 * Lists every signal (absent ones as "No Result"), the verdict with its
 * agreement scores, and where the files ended up.
 */
export function generateReportContent(report: BatchItemReport, generatedAt: Date = new Date()): string {
  const lines: string[] = [];

  lines.push(`# Clip Report ${String(report.index).padStart(3, "0")}`);
  lines.push("");
  lines.push(`Generated: ${generatedAt.toISOString()}`);
  lines.push("");

  lines.push("## Source");
  lines.push("");
  lines.push(`- **URL:** ${report.url}`);
  if (report.acquisition) {
    lines.push(`- **Provider:** ${report.acquisition.provider}`);
    const probe = report.acquisition.probe;
    if (probe?.durationSeconds !== undefined) {
      lines.push(`- **Duration:** ${probe.durationSeconds.toFixed(1)}s`);
    }
    if (probe?.container) {
      lines.push(`- **Format:** ${[probe.container, probe.codec].filter(Boolean).join(" / ")}`);
    }
  }
  lines.push("");

  lines.push("## Signals");
  lines.push("");
  lines.push("| Source | Kind | Result |");
  lines.push("|---|---|---|");
  for (const signal of report.signals) {
    const result = signal.present ? signal.label : signal.reason ? `No Result (${signal.reason})` : "No Result";
    lines.push(`| ${signal.source} | ${signal.kind} | ${result} |`);
  }
  lines.push("");

  if (report.verdict) {
    lines.push("## Verdict");
    lines.push("");
    lines.push(`- **Status:** ${report.verdict.status}`);
    lines.push(`- **Winning Label:** ${report.verdict.winningLabel}`);
    if (report.verdict.winningSource) {
      lines.push(`- **Winning Source:** ${report.verdict.winningSource}`);
    }
    lines.push("");

    if (report.verdict.agreements.length > 0) {
      lines.push("| Pair | Score | Agrees |");
      lines.push("|---|---|---|");
      for (const pair of report.verdict.agreements) {
        lines.push(`| ${pair.a} ~ ${pair.b} | ${pair.score} | ${pair.agrees ? "yes" : "no"} |`);
      }
      lines.push("");
    }
  }

  if (report.master) {
    lines.push("## Master");
    lines.push("");
    lines.push(...describeMaster(report.master));
    lines.push("");
  }

  if (report.failure) {
    lines.push("## Failure");
    lines.push("");
    lines.push(`- **Kind:** ${report.failure.kind}`);
    lines.push(`- **Stage:** ${report.failure.stage}`);
    lines.push(`- **Reason:** ${report.failure.reason}`);
    lines.push("");
  }

  if (report.issues.length > 0) {
    lines.push("## Issues");
    lines.push("");
    for (const issue of report.issues) {
      lines.push(`- **${issue.kind}:** ${issue.message}`);
    }
    lines.push("");
  }

  lines.push("## Files");
  lines.push("");
  if (report.files.reference) {
    lines.push(`- **Reference:** ${path.basename(report.files.reference)}`);
  }
  if (report.files.master) {
    lines.push(`- **Master:** ${path.basename(report.files.master)}`);
  }
  lines.push("");

  return lines.join("\n");
}

function describeMaster(master: MasterOutcome): string[] {
  switch (master.status) {
    case "SKIPPED":
      return [`- **Status:** SKIPPED (${master.reason})`];
    case "NOT_FOUND":
      return [
        "- **Status:** NOT_FOUND",
        `- **Query:** ${master.query}`,
        `- **Candidates Checked:** ${master.candidates}`,
      ];
    case "FAILED":
      return ["- **Status:** FAILED", `- **Query:** ${master.query}`, `- **Reason:** ${master.reason}`];
    case "DOWNLOADED":
      return [
        "- **Status:** DOWNLOADED",
        `- **Query:** ${master.query}`,
        `- **Candidate:** ${master.candidate.title} (${master.candidate.durationSeconds ?? "?"}s)`,
        `- **URL:** ${master.candidate.url}`,
        `- **Tagged:** ${master.tagged ? "yes" : "no"}`,
      ];
  }
}

/**
 * Write report.md into the item directory.
 */
export async function writeItemReport(itemDir: string, content: string): Promise<string> {
  const reportPath = path.join(itemDir, ITEM_REPORT_NAME);
  try {
    await fs.writeFile(reportPath, content, "utf-8");
  } catch (error) {
    throw new FatalIOError("Write report", reportPath, error);
  }
  return reportPath;
}

/** One error log line: "url | stage | kind: reason" */
export function formatErrorLine(url: string, failure: ItemFailure): string {
  const reason = failure.reason.replace(/\r?\n/g, " ");
  return `${url} | ${failure.stage} | ${failure.kind}: ${reason}`;
}

export async function appendErrorLog(logPath: string, url: string, failure: ItemFailure): Promise<void> {
  try {
    await fs.mkdir(path.dirname(logPath), { recursive: true });
    await fs.appendFile(logPath, `${formatErrorLine(url, failure)}\n`, "utf-8");
  } catch (error) {
    throw new FatalIOError("Append error log", logPath, error);
  }
}

/** Append one item report as a JSON line */
export async function appendBatchReport(reportPath: string, report: BatchItemReport): Promise<void> {
  try {
    await fs.mkdir(path.dirname(reportPath), { recursive: true });
    await fs.appendFile(reportPath, `${JSON.stringify(report)}\n`, "utf-8");
  } catch (error) {
    throw new FatalIOError("Append batch report", reportPath, error);
  }
}
