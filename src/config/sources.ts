/**
 * Feed source configuration
 * Reads config/sources.json (or SOURCES_PATH). Entries that fail validation are
 * skipped with a warning.
 */

import * as fs from "fs";
import * as path from "path";
import { z } from "zod";
import type { SourceConfig } from "../lib/model";
import { logger } from "../lib/logger";
import { formatZodError } from "./settings";

export const SourceConfigSchema = z.object({
  name: z.string().trim().min(1),
  url: z.string().url(),
  category: z.string().trim().min(1).default("general"),
  weight: z.number().min(0).max(1).default(1.0),
  enabled: z.boolean().default(true),
});

const SourcesFileSchema = z.object({
  sources: z.array(z.unknown()),
});

export function resolveSourcesPath(): string {
  return path.resolve(process.cwd(), process.env.SOURCES_PATH || "config/sources.json");
}

/**
 * Validate a parsed sources document, dropping invalid entries
 */
export function parseSources(input: unknown): SourceConfig[] {
  const file = SourcesFileSchema.safeParse(input);
  if (!file.success) {
    throw new Error(`Invalid configuration: ${formatZodError(file.error)}`);
  }

  const sources: SourceConfig[] = [];
  file.data.sources.forEach((entry, index) => {
    const parsed = SourceConfigSchema.safeParse(entry);
    if (parsed.success) {
      sources.push(parsed.data);
    } else {
      logger.warn(`Skipping invalid source at index ${index}`, {
        issues: formatZodError(parsed.error),
      });
    }
  });

  return sources;
}

export function loadSources(sourcesPath: string = resolveSourcesPath()): SourceConfig[] {
  if (!fs.existsSync(sourcesPath)) {
    throw new Error(`Sources file not found: ${sourcesPath}`);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(sourcesPath, "utf-8"));
  } catch (error) {
    throw new Error(
      `Invalid JSON in sources file ${sourcesPath}: ${error instanceof Error ? error.message : String(error)}`
    );
  }

  const sources = parseSources(raw);
  logger.info(`Loaded ${sources.length} sources from ${sourcesPath}`);
  return sources;
}

export function getEnabledSources(sources: SourceConfig[]): SourceConfig[] {
  return sources.filter((source) => source.enabled);
}

/**
 * Validate a new source and append it; names and URLs must be unique
 */
export function addSource(sources: SourceConfig[], input: unknown): SourceConfig[] {
  const parsed = SourceConfigSchema.safeParse(input);
  if (!parsed.success) {
    throw new Error(`Invalid source: ${formatZodError(parsed.error)}`);
  }

  const source = parsed.data;
  if (sources.some((s) => s.name === source.name || s.url === source.url)) {
    throw new Error(`Source '${source.name}' or URL already exists`);
  }
  return [...sources, source];
}

export function removeSource(sources: SourceConfig[], name: string): SourceConfig[] {
  const remaining = sources.filter((s) => s.name !== name);
  if (remaining.length === sources.length) {
    throw new Error(`Source '${name}' not found`);
  }
  return remaining;
}

/**
 * Sources to probe: all of them, or the one named
 */
export function selectSources(sources: SourceConfig[], name?: string): SourceConfig[] {
  if (!name) return sources;
  const selected = sources.filter((s) => s.name === name);
  if (selected.length === 0) {
    throw new Error(`Source '${name}' not found`);
  }
  return selected;
}

export function serializeSources(sources: SourceConfig[]): string {
  return `${JSON.stringify({ sources }, null, 2)}\n`;
}

export function saveSources(sources: SourceConfig[], sourcesPath: string = resolveSourcesPath()): void {
  fs.mkdirSync(path.dirname(sourcesPath), { recursive: true });
  fs.writeFileSync(sourcesPath, serializeSources(sources), "utf-8");
  logger.info(`Saved ${sources.length} sources to ${sourcesPath}`);
}

export function formatSourcesTable(sources: SourceConfig[]): string[] {
  const nameWidth = Math.max(4, ...sources.map((s) => s.name.length));
  const categoryWidth = Math.max(8, ...sources.map((s) => s.category.length));
  const row = (name: string, category: string, weight: string, enabled: string, url: string) =>
    `${name.padEnd(nameWidth)}  ${category.padEnd(categoryWidth)}  ${weight.padEnd(6)}  ${enabled.padEnd(7)}  ${url}`;

  return [
    row("Name", "Category", "Weight", "Enabled", "URL"),
    ...sources.map((s) => row(s.name, s.category, s.weight.toFixed(1), s.enabled ? "yes" : "no", s.url)),
  ];
}
