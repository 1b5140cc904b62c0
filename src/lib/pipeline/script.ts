/**
 * Narration script generation
 * Turns show notes into a spoken script and formats it for text-to-speech.
 */

import type { GenerationStats, Script, ShowNotes } from "../model";
import { logger } from "../logger";
import { type LLMProvider, WORDS_PER_MINUTE } from "../llm/provider";
import { formatDisplayDate, usageDelta } from "./showNotes";

function pad2(n: number): string {
  return String(n).padStart(2, "0");
}

export function estimateReadingTime(text: string): { words: number; minutes: number } {
  const words = text.match(/\b\w+\b/g)?.length ?? 0;
  return { words, minutes: words / WORDS_PER_MINUTE };
}

/**
 * Plain-text rendering of the show notes used as the script prompt
 */
export function formatShowNotesForScript(showNotes: ShowNotes): string {
  const lines = [`Date: ${showNotes.runDate}`, `Total Articles: ${showNotes.totalArticles}`, ""];

  for (const section of showNotes.sections) {
    lines.push(`## ${section.title}`, "");
    for (const article of section.articles) {
      lines.push(`**${article.title}** (${article.outlet}, ${article.publishedDate})`);
      for (const bullet of article.bulletPoints) {
        lines.push(`- ${bullet}`);
      }
      lines.push("");
    }
  }

  return lines.join("\n");
}

export interface GenerateScriptInput {
  provider: LLMProvider;
  showNotes: ShowNotes;
  targetMinutes: number;
  runDate?: string;
  now?: Date;
}

/**
 * Generate a script from show notes. Provider errors propagate.
 */
export async function generateScript(input: GenerateScriptInput): Promise<{ script: Script; stats: GenerationStats }> {
  const { provider, showNotes, targetMinutes } = input;
  const runDate = input.runDate ?? showNotes.runDate;
  const startedAt = Date.now();
  const usageBefore = provider.getUsageStats();

  const content = await provider.generateScript({
    showNotes: formatShowNotesForScript(showNotes),
    targetMinutes,
    runDate,
  });

  const { words, minutes } = estimateReadingTime(content);
  const script: Script = {
    runDate,
    targetMinutes,
    content,
    estimatedWords: words,
    estimatedMinutes: minutes,
    generatedAt: input.now ?? new Date(),
  };

  const stats: GenerationStats = {
    articlesProcessed: showNotes.totalArticles,
    ...usageDelta(usageBefore, provider.getUsageStats()),
    processingTime: (Date.now() - startedAt) / 1000,
  };

  logger.info(`[LLM] Script: ${words} words, ~${minutes.toFixed(1)} min (target ${targetMinutes})`);
  return { script, stats };
}

/**
 * Regenerate with a nudged target until the estimate lands within tolerance.
 * Returns the first in-tolerance script, else the first attempt, with summed stats.
 */
export async function optimizeForTargetLength(
  input: GenerateScriptInput & { toleranceMinutes?: number; maxIterations?: number }
): Promise<{ script: Script; stats: GenerationStats }> {
  const tolerance = input.toleranceMinutes ?? 0.5;
  const maxIterations = Math.max(1, input.maxIterations ?? 2);
  let target = input.targetMinutes;
  let best: Script | null = null;
  const total: GenerationStats = {
    articlesProcessed: input.showNotes.totalArticles,
    tokensUsed: 0,
    apiCalls: 0,
    costEstimate: 0,
    processingTime: 0,
  };

  for (let i = 0; i < maxIterations; i++) {
    const { script, stats } = await generateScript({ ...input, targetMinutes: target });
    total.tokensUsed += stats.tokensUsed;
    total.apiCalls += stats.apiCalls;
    total.costEstimate += stats.costEstimate;
    total.processingTime += stats.processingTime;

    // Measured against the original target, not the nudged one
    const withinTolerance = Math.abs(script.estimatedMinutes - input.targetMinutes) <= tolerance;
    if (withinTolerance || best === null) {
      best = script;
    }
    if (withinTolerance) {
      break;
    }

    target = script.estimatedMinutes > input.targetMinutes ? Math.max(1, target - 1) : target + 1;
  }

  if (!best) {
    throw new Error("Script optimization produced no script");
  }
  return { script: best, stats: total };
}

/**
 * script.txt: metadata header followed by the script body
 */
export function formatScriptFile(script: Script): string {
  const generated = script.generatedAt;
  return [
    `# AI News Briefing Script - ${script.runDate}`,
    "",
    `Target: ${script.targetMinutes} minutes`,
    `Estimated: ${script.estimatedMinutes.toFixed(1)} minutes (${script.estimatedWords} words)`,
    `Generated: ${formatDisplayDate(generated)} at ${pad2(generated.getUTCHours())}:${pad2(generated.getUTCMinutes())} UTC`,
    "",
    "---",
    "",
    script.content,
  ].join("\n");
}

const PAUSE_PHRASES = [
  /(Welcome to[^.]*\.)/gi,
  /(Today[^.]*\.)/gi,
  /(Let's dive in\.)/gi,
  /(Moving on[^.]*\.)/gi,
  /(Next[^.]*\.)/gi,
  /(Finally[^.]*\.)/gi,
  /(In conclusion[^.]*\.)/gi,
  /(That wraps up[^.]*\.)/gi,
];

/**
 * Strip markdown leftovers and add paragraph pauses between sentences and after
 * transition phrases
 */
export function formatForTts(content: string): string {
  let text = content
    .replace(/^#.*$/gm, "")
    .replace(/^\*.*\*$/gm, "")
    .replace(/\n{3,}/g, "\n\n")
    .replace(/[ \t]+/g, " ")
    .replace(/\.(\s+)([A-Z])/g, ".\n\n$2");

  for (const phrase of PAUSE_PHRASES) {
    text = text.replace(phrase, "$1\n\n");
  }

  return text.replace(/\n{3,}/g, "\n\n").trim();
}

/**
 * script_tts_<DD-HH-mm>.txt, UTC
 */
export function createTtsFilename(now: Date = new Date()): string {
  return `script_tts_${pad2(now.getUTCDate())}-${pad2(now.getUTCHours())}-${pad2(now.getUTCMinutes())}.txt`;
}
