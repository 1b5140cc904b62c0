/**
 * Extracted article body loading
 */

import { promises as fs } from "fs";
import { errorMessage, logger } from "../logger";

export type ContentLoader = (extractedPath: string | undefined) => Promise<string | null>;

/**
 * Read an extracted body from disk. Returns null when there is no path or the read fails.
 */
export const loadArticleContent: ContentLoader = async (extractedPath) => {
  if (!extractedPath) {
    return null;
  }
  try {
    return await fs.readFile(extractedPath, "utf-8");
  } catch (error) {
    logger.debug(`[RANK] Could not read extracted content at ${extractedPath}`, {
      error: errorMessage(error),
    });
    return null;
  }
};
