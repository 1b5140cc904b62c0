/**
 * Tests for settings validation and loading
 */

import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import fs from "fs";
import os from "os";
import path from "path";
import {
  explicitWeightSum,
  getLlmApiKey,
  loadSettings,
  parseRankingConfig,
  parseSettings,
  preferenceWeight,
  resolveWorkspaceRoot,
} from "@/src/config/settings";

describe("parseRankingConfig", () => {
  it("should apply defaults", () => {
    expect(parseRankingConfig({})).toEqual({
      recencyWeight: 0.3,
      sourceWeight: 0.2,
      topicWeight: 0.3,
      noveltyWeight: 0.2,
      noveltyWindowRuns: 4,
    });
  });

  it("should accept weights within tolerance of 1.0", () => {
    const config = parseRankingConfig({ recencyWeight: 0.4005, sourceWeight: 0.2, topicWeight: 0.2, noveltyWeight: 0.2 });
    expect(explicitWeightSum(config)).toBeCloseTo(1.0005, 10);
    expect(preferenceWeight(config)).toBeCloseTo(-0.0005, 10);
  });

  it("should reject weights that do not sum to 1.0", () => {
    expect(() => parseRankingConfig({ recencyWeight: 0.2, sourceWeight: 0.2, topicWeight: 0.3, noveltyWeight: 0.2 })).toThrow(
      /Weights must sum to 1\.0/
    );
  });

  it("should reject weights outside [0, 1]", () => {
    expect(() => parseRankingConfig({ recencyWeight: 1.2, sourceWeight: 0, topicWeight: 0, noveltyWeight: 0 })).toThrow(
      /^Invalid configuration: recencyWeight:/
    );
  });

  it("should reject a novelty window over 10 runs", () => {
    expect(() => parseRankingConfig({ noveltyWindowRuns: 11 })).toThrow(/noveltyWindowRuns/);
  });
});

describe("parseSettings", () => {
  it("should fill every section with defaults", () => {
    const settings = parseSettings(undefined);

    expect(settings.workspaceRoot).toBe(".data/briefings");
    expect(settings.runDefaults).toEqual({ minutes: 12, maxItems: 150, maxStories: 20, minScore: 0.1 });
    expect(settings.llm).toEqual({ provider: "openai", model: "gpt-4o-mini", apiKeyEnv: "OPENAI_API_KEY" });
    expect(settings.fetch).toEqual({
      feedConcurrency: 5,
      articleConcurrency: 3,
      timeoutMs: 30000,
      userAgent: "DailyBriefing/1.0 (+feed reader)",
    });
    expect(settings.preferences).toEqual({
      boostKeywords: [],
      suppressKeywords: [],
      preferredOutlets: [],
      preferredCategories: [],
    });
  });

  it("should trim keywords and reject blank ones", () => {
    expect(parseSettings({ preferences: { boostKeywords: ["  llm "] } }).preferences.boostKeywords).toEqual(["llm"]);
    expect(() => parseSettings({ preferences: { boostKeywords: ["   "] } })).toThrow(
      /^Invalid configuration: preferences\.boostKeywords\.0:/
    );
  });

  it("should reject an unknown provider", () => {
    expect(() => parseSettings({ llm: { provider: "other" } })).toThrow(/llm\.provider/);
  });
});

describe("loadSettings", () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "briefing-settings-"));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it("should load and validate a settings file", () => {
    const file = path.join(dir, "settings.json");
    fs.writeFileSync(file, JSON.stringify({ runDefaults: { minutes: 5 } }));

    const settings = loadSettings(file);
    expect(settings.runDefaults.minutes).toBe(5);
    expect(settings.runDefaults.maxStories).toBe(20);
  });

  it("should report a missing file", () => {
    const file = path.join(dir, "missing.json");
    expect(() => loadSettings(file)).toThrow(`Settings file not found: ${file}`);
  });

  it("should report malformed JSON", () => {
    const file = path.join(dir, "broken.json");
    fs.writeFileSync(file, "{ not json");
    expect(() => loadSettings(file)).toThrow(`Invalid JSON in settings file ${file}:`);
  });

  it("should load the repository settings", () => {
    const settings = loadSettings(path.resolve(process.cwd(), "config/settings.json"));
    expect(settings.preferences.suppressKeywords).toEqual(["sponsored", "webinar", "giveaway"]);
    expect(explicitWeightSum(settings.ranking)).toBeCloseTo(1, 3);
  });
});

describe("environment helpers", () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it("should read and trim the configured API key", () => {
    vi.stubEnv("TEST_BRIEFING_KEY", "  test-secret  ");
    const settings = parseSettings({ llm: { apiKeyEnv: "TEST_BRIEFING_KEY" } });
    expect(getLlmApiKey(settings)).toBe("test-secret");
  });

  it("should treat a blank key as missing", () => {
    vi.stubEnv("TEST_BRIEFING_KEY", "   ");
    const settings = parseSettings({ llm: { apiKeyEnv: "TEST_BRIEFING_KEY" } });
    expect(getLlmApiKey(settings)).toBeUndefined();
  });

  it("should expand a leading tilde in the workspace root", () => {
    const settings = parseSettings({ workspaceRoot: "~/briefings" });
    expect(resolveWorkspaceRoot(settings)).toBe(path.join(os.homedir(), "briefings"));
  });

  it("should resolve relative workspace roots from the working directory", () => {
    const settings = parseSettings({ workspaceRoot: "out" });
    expect(resolveWorkspaceRoot(settings)).toBe(path.resolve(process.cwd(), "out"));
  });
});
