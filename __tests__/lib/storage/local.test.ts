import { describe, it, expect, beforeEach, afterEach } from "vitest";
import fs from "fs";
import os from "os";
import path from "path";
import { LocalArtifactStore } from "@/src/lib/storage/local";

describe("LocalArtifactStore", () => {
  let root: string;

  beforeEach(() => {
    root = fs.mkdtempSync(path.join(os.tmpdir(), "briefing-artifacts-"));
  });

  afterEach(() => {
    fs.rmSync(root, { recursive: true, force: true });
  });

  it("should write article text under the run's extracted directory", async () => {
    const store = new LocalArtifactStore(root);
    const filePath = await store.writeArticleText("2025-01-10", 7, "Hello");

    expect(filePath).toBe(path.join(root, "runs", "2025-01-10", "extracted", "article_7.txt"));
    expect(fs.readFileSync(filePath, "utf-8")).toBe("Hello");
  });

  it("should write run files beside the extracted directory", async () => {
    const store = new LocalArtifactStore(root);
    const filePath = await store.writeRunFile("2025-01-10", "show_notes.md", "# Notes");

    expect(filePath).toBe(path.join(store.runDir("2025-01-10"), "show_notes.md"));
    expect(fs.readFileSync(filePath, "utf-8")).toBe("# Notes");
  });

  it("should create the workspace root when absent", () => {
    const nested = path.join(root, "a", "b");
    new LocalArtifactStore(nested);
    expect(fs.existsSync(nested)).toBe(true);
  });
});
