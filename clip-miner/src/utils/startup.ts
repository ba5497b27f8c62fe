import type { ToolsConfig, ProgressCallback } from "../config/types.js";
import type { CommandRunner } from "./exec.js";
import type { MissingTool } from "../errors.js";
import { ToolNotFoundError } from "../errors.js";

interface RequiredTool extends MissingTool {
  versionFlag: string;
}

function requiredTools(tools: ToolsConfig, needsFpcalc: boolean): RequiredTool[] {
  const list: RequiredTool[] = [
    {
      command: tools.ffmpeg,
      versionFlag: "-version",
      purpose: "audio normalization and tagging",
      installHint:
        "Ubuntu/Debian: sudo apt install ffmpeg\n" +
        "    macOS: brew install ffmpeg\n" +
        "    Windows: https://ffmpeg.org/download.html",
    },
    {
      command: tools.ytDlp,
      versionFlag: "--version",
      purpose: "native extraction and catalog search",
      installHint:
        "pipx install yt-dlp\n" +
        "    macOS: brew install yt-dlp\n" +
        "    Other: https://github.com/yt-dlp/yt-dlp#installation",
    },
  ];

  if (needsFpcalc) {
    list.push({
      command: tools.fpcalc,
      versionFlag: "-version",
      purpose: "AcoustID fingerprinting",
      installHint:
        "Ubuntu/Debian: sudo apt install libchromaprint-tools\n" +
        "    macOS: brew install chromaprint\n" +
        "    Other: https://acoustid.org/chromaprint",
    });
  }

  return list;
}

/**
 * Verify the external tools are available.
 * fpcalc is only required when AcoustID is configured.
 * Throws ToolNotFoundError listing every missing tool.
 */
export async function verifyRequiredTools(
  tools: ToolsConfig,
  needsFpcalc: boolean,
  runner: CommandRunner,
  onProgress?: ProgressCallback
): Promise<void> {
  onProgress?.("Checking required tools...");
  const missing: MissingTool[] = [];

  for (const tool of requiredTools(tools, needsFpcalc)) {
    try {
      await runner.run(tool.command, [tool.versionFlag], { timeoutMs: 15_000 });
      onProgress?.(`  ${tool.command}: found`);
    } catch {
      onProgress?.(`  ${tool.command}: MISSING`);
      missing.push({ command: tool.command, purpose: tool.purpose, installHint: tool.installHint });
    }
  }

  if (missing.length > 0) {
    throw new ToolNotFoundError(missing);
  }

  onProgress?.("All required tools found.\n");
}
