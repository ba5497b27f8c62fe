import { parseFile } from "music-metadata";
import { describeError } from "../errors.js";
import { logger } from "../utils/logger.js";

/** Container properties of an acquired reference file */
export interface MediaProbe {
  durationSeconds?: number;
  container?: string;
  codec?: string;
}

/**
 * Read duration and format of a reference file using music-metadata.
 * Returns undefined when the file cannot be parsed; the report then simply
 * omits these fields.
 */
export async function probeMedia(filePath: string): Promise<MediaProbe | undefined> {
  try {
    const metadata = await parseFile(filePath, { duration: true, skipCovers: true });
    return {
      durationSeconds: metadata.format.duration,
      container: metadata.format.container,
      codec: metadata.format.codec,
    };
  } catch (error) {
    logger.debug(`Could not probe ${filePath}: ${describeError(error)}`);
    return undefined;
  }
}
