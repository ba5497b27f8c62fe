#!/usr/bin/env node
import { buildApplication, buildCommand, numberParser, run } from "@stricli/core";
import type { CommandContext } from "@stricli/core";
import chalk from "chalk";
import { mineClips } from "./clip-miner.js";
import type { CliFlags } from "./config/types.js";
import type { BatchEvent } from "./batch/types.js";
import { INTERRUPT_EXIT_CODE, createInterruptHandler } from "./utils/interrupt.js";

function printEvent(event: BatchEvent): void {
  if (event.type === "complete") {
    return;
  }
  const prefix = `[${event.index}/${event.total}]`;
  const line = `${prefix} ${event.stage.padEnd(16)} ${event.message}`;
  switch (event.outcome) {
    case "success":
      console.log(chalk.green(line));
      break;
    case "partial":
      console.log(chalk.yellow(line));
      break;
    case "failed":
      console.log(chalk.red(line));
      break;
    default:
      console.log(line);
  }
}

const mineCommand = buildCommand({
  docs: {
    brief: "Acquire short-form clips, identify their music and download full-length masters",
  },
  parameters: {
    positional: {
      kind: "array",
      parameter: {
        brief: "URL or path to a text file containing URLs",
        parse: String,
        placeholder: "input",
      },
      minimum: 1,
    },
    flags: {
      config: {
        kind: "parsed",
        brief: "Path to config JSON file",
        parse: String,
        optional: true,
      },
      output: {
        kind: "parsed",
        brief: "Override output directory",
        parse: String,
        optional: true,
      },
      media: {
        kind: "enum",
        brief: "Acquire audio only or the full video",
        values: ["audio", "video"],
        optional: true,
      },
      concurrency: {
        kind: "parsed",
        brief: "Number of URLs processed at once",
        parse: numberParser,
        optional: true,
      },
      "skip-master": {
        kind: "boolean",
        brief: "Identify only, do not download masters",
        default: false,
      },
      debug: {
        kind: "boolean",
        brief: "Enable debug logging",
        default: false,
      },
    },
    aliases: {
      c: "config",
      o: "output",
      m: "media",
      d: "debug",
    },
  },
  async func(this: CommandContext, flags: CliFlags, ...inputs: string[]): Promise<void> {
    console.log("Clip Miner");
    console.log("==========");
    console.log(`Inputs: ${inputs.length}`);
    console.log();

    const interrupt = createInterruptHandler({
      onStop: () => console.log("\nStopping after the items in progress... (Ctrl-C again to quit now)"),
      onForce: () => {
        console.error("\nInterrupted");
        process.exit(INTERRUPT_EXIT_CODE);
      },
    });
    process.on("SIGINT", interrupt.handle);

    try {
      const result = await mineClips(inputs, flags, {
        onEvent: printEvent,
        shouldStop: interrupt.stopRequested,
      });

      console.log();
      console.log("Results");
      console.log("-------");
      for (const r of result.reports) {
        const label = r.verdict ? `${r.verdict.status} ${r.verdict.winningLabel}` : r.failure?.reason ?? "";
        console.log(`${String(r.index).padStart(3, "0")} ${r.outcome.padEnd(7)} ${label}`);
      }
      console.log();
      console.log(
        `${result.succeeded} succeeded, ${result.partial} partial, ${result.failed} failed`
      );
      console.log(`Report:    ${result.reportPath}`);
      if (result.failed > 0) {
        console.log(`Error log: ${result.errorLogPath}`);
      }
    } catch (e) {
      console.error(`\nFATAL: ${e instanceof Error ? e.message : String(e)}`);
      process.exitCode = 1;
    } finally {
      process.off("SIGINT", interrupt.handle);
    }
  },
});

const app = buildApplication(mineCommand, {
  name: "clip-miner",
  versionInfo: {
    currentVersion: "1.0.0",
  },
});

void run(app, process.argv.slice(2), { process });
