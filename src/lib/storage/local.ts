/**
 * Local file storage for run artifacts
 * Layout under the workspace root:
 *   runs/<YYYY-MM-DD>/extracted/article_<id>.txt
 *   runs/<YYYY-MM-DD>/show_notes.md, script.txt, script_tts_*.txt, pipeline_stats.json
 */

import fs from "fs";
import path from "path";
import { logger } from "../logger";

export interface ArtifactStore {
  /** Absolute directory for one run's artifacts */
  runDir(runDate: string): string;
  writeArticleText(runDate: string, articleId: number, text: string): Promise<string>;
  writeRunFile(runDate: string, fileName: string, content: string): Promise<string>;
}

function ensureDir(dir: string) {
  if (!fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: true });
  }
}

export class LocalArtifactStore implements ArtifactStore {
  constructor(private readonly workspaceRoot: string) {
    ensureDir(workspaceRoot);
  }

  runDir(runDate: string): string {
    return path.join(this.workspaceRoot, "runs", runDate);
  }

  articleTextPath(runDate: string, articleId: number): string {
    return path.join(this.runDir(runDate), "extracted", `article_${articleId}.txt`);
  }

  async writeArticleText(runDate: string, articleId: number, text: string): Promise<string> {
    return this.put(this.articleTextPath(runDate, articleId), text);
  }

  async writeRunFile(runDate: string, fileName: string, content: string): Promise<string> {
    return this.put(path.join(this.runDir(runDate), fileName), content);
  }

  private put(filePath: string, content: string): string {
    try {
      ensureDir(path.dirname(filePath));
      fs.writeFileSync(filePath, content, "utf-8");
      logger.debug("[STORAGE] Artifact written", {
        path: filePath,
        bytes: Buffer.byteLength(content, "utf-8"),
      });
      return filePath;
    } catch (error) {
      logger.error(`[STORAGE] Failed to write ${filePath}`, error);
      throw error;
    }
  }
}
