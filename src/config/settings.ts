/**
 * Pipeline settings
 * Ranking weights, keyword preferences, run defaults, LLM and fetch options.
 * Loaded from config/settings.json (or SETTINGS_PATH) and validated with zod.
 */

import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { z } from "zod";

/**
 * Allowed drift of the four explicit ranking weights from 1.0
 */
export const WEIGHT_SUM_TOLERANCE = 0.001;

const weight = (fallback: number) => z.number().min(0).max(1).default(fallback);

export const RankingConfigSchema = z
  .object({
    recencyWeight: weight(0.3),
    sourceWeight: weight(0.2),
    topicWeight: weight(0.3),
    noveltyWeight: weight(0.2),
    noveltyWindowRuns: z.number().int().min(1).max(10).default(4),
  })
  .superRefine((config, ctx) => {
    const total = explicitWeightSum(config);
    if (Math.abs(total - 1.0) > WEIGHT_SUM_TOLERANCE) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `Weights must sum to 1.0, got ${total}`,
      });
    }
  });

export type RankingConfig = z.infer<typeof RankingConfigSchema>;

const keywordList = z.array(z.string().trim().min(1)).default([]);

export const PreferencesSchema = z.object({
  boostKeywords: keywordList,
  suppressKeywords: keywordList,
  preferredOutlets: keywordList,
  preferredCategories: keywordList,
});

export type Preferences = z.infer<typeof PreferencesSchema>;

export const RunDefaultsSchema = z.object({
  minutes: z.number().int().min(1).max(60).default(12),
  maxItems: z.number().int().min(1).max(1000).default(150),
  maxStories: z.number().int().min(1).max(100).default(20),
  minScore: z.number().min(0).max(1).default(0.1),
});

export type RunDefaults = z.infer<typeof RunDefaultsSchema>;

export const LlmSettingsSchema = z.object({
  provider: z.enum(["openai", "mock"]).default("openai"),
  model: z.string().min(1).default("gpt-4o-mini"),
  apiKeyEnv: z.string().min(1).default("OPENAI_API_KEY"),
  baseUrl: z.string().url().optional(),
});

export type LlmSettings = z.infer<typeof LlmSettingsSchema>;

export const FetchSettingsSchema = z.object({
  feedConcurrency: z.number().int().min(1).max(20).default(5),
  articleConcurrency: z.number().int().min(1).max(20).default(3),
  timeoutMs: z.number().int().min(1000).max(120000).default(30000),
  userAgent: z.string().min(1).default("DailyBriefing/1.0 (+feed reader)"),
});

export type FetchSettings = z.infer<typeof FetchSettingsSchema>;

export const SettingsSchema = z.object({
  workspaceRoot: z.string().min(1).default(".data/briefings"),
  runDefaults: RunDefaultsSchema.default({}),
  ranking: RankingConfigSchema.default({}),
  preferences: PreferencesSchema.default({}),
  llm: LlmSettingsSchema.default({}),
  fetch: FetchSettingsSchema.default({}),
});

export type Settings = z.infer<typeof SettingsSchema>;

export function explicitWeightSum(config: {
  recencyWeight: number;
  sourceWeight: number;
  topicWeight: number;
  noveltyWeight: number;
}): number {
  return config.recencyWeight + config.sourceWeight + config.topicWeight + config.noveltyWeight;
}

/**
 * Weight left over for the preference signal.
 * Under a valid config this is within WEIGHT_SUM_TOLERANCE of zero.
 */
export function preferenceWeight(config: RankingConfig): number {
  return 1 - explicitWeightSum(config);
}

export function formatZodError(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join(".") : "(root)"}: ${issue.message}`)
    .join("; ");
}

function parseWith<T extends z.ZodTypeAny>(schema: T, input: unknown): z.infer<T> {
  const result = schema.safeParse(input);
  if (!result.success) {
    throw new Error(`Invalid configuration: ${formatZodError(result.error)}`);
  }
  return result.data;
}

export function parseRankingConfig(input: unknown): RankingConfig {
  return parseWith(RankingConfigSchema, input);
}

export function parseSettings(input: unknown): Settings {
  return parseWith(SettingsSchema, input ?? {});
}

export function resolveSettingsPath(): string {
  return path.resolve(process.cwd(), process.env.SETTINGS_PATH || "config/settings.json");
}

/**
 * Read and validate the settings file
 */
export function loadSettings(settingsPath: string = resolveSettingsPath()): Settings {
  if (!fs.existsSync(settingsPath)) {
    throw new Error(`Settings file not found: ${settingsPath}`);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(settingsPath, "utf-8"));
  } catch (error) {
    throw new Error(
      `Invalid JSON in settings file ${settingsPath}: ${error instanceof Error ? error.message : String(error)}`
    );
  }

  return parseSettings(raw);
}

/**
 * Absolute workspace directory; a leading ~ expands to the home directory
 */
export function resolveWorkspaceRoot(settings: Settings): string {
  const root = settings.workspaceRoot;
  if (root === "~" || root.startsWith("~/")) {
    return path.join(os.homedir(), root.slice(1));
  }
  return path.resolve(process.cwd(), root);
}

export function getLlmApiKey(settings: Settings): string | undefined {
  const key = process.env[settings.llm.apiKeyEnv];
  return key && key.trim().length > 0 ? key.trim() : undefined;
}
