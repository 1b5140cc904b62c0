/**
 * Show notes generation
 * Groups the selected articles into keyword sections, summarises each one into
 * bullets and renders the result as markdown.
 */

import type { ArticleSummary, GenerationStats, RunArticle, ShowNotes, ShowNotesSection } from "../model";
import { errorMessage, logger } from "../logger";
import type { LLMProvider, UsageStats } from "../llm/provider";
import { type ContentLoader, loadArticleContent } from "./content";

export const SECTION_TITLES = [
  "Deployments & Implementations",
  "Product Launches & Updates",
  "Research & Breakthroughs",
  "Industry & Business",
  "Policy & Governance",
] as const;

export type SectionTitle = (typeof SECTION_TITLES)[number];

const DEPLOYMENT_WORDS = ["deploy", "production", "enterprise", "implementation", "rollout", "launch"];
const LAUNCH_WORDS = ["releases", "announces", "unveils", "launches", "introduces", "available"];
const RESEARCH_WORDS = ["research", "study", "paper", "breakthrough", "discovery", "mit", "stanford"];
const BUSINESS_WORDS = ["funding", "investment", "acquisition", "partnership", "revenue", "ipo"];
const POLICY_WORDS = ["regulation", "policy", "law", "government", "congress", "senate"];

/** Only the opening of the body is scanned for section keywords */
const BODY_SCAN_CHARS = 500;

const MONTHS = ["Jan", "Feb", "Mar", "Apr", "May", "Jun", "Jul", "Aug", "Sep", "Oct", "Nov", "Dec"];

function pad2(n: number): string {
  return String(n).padStart(2, "0");
}

/**
 * "Jan 05, 2025" in UTC
 */
export function formatDisplayDate(date: Date | undefined): string {
  if (!date || Number.isNaN(date.getTime())) {
    return "Unknown date";
  }
  return `${MONTHS[date.getUTCMonth()]} ${pad2(date.getUTCDate())}, ${date.getUTCFullYear()}`;
}

/**
 * Pick a section from title, body opening and source category. First rule wins.
 */
export function categorizeArticle(title: string, content: string, sourceCategory: string): SectionTitle {
  const titleLower = title.toLowerCase();
  const bodyLower = content.slice(0, BODY_SCAN_CHARS).toLowerCase();
  const category = sourceCategory.toLowerCase();

  const inTitleOrBody = (words: string[]) =>
    words.some((word) => titleLower.includes(word) || bodyLower.includes(word));

  if (inTitleOrBody(DEPLOYMENT_WORDS)) {
    return "Deployments & Implementations";
  }
  if (LAUNCH_WORDS.some((word) => titleLower.includes(word))) {
    return "Product Launches & Updates";
  }
  if (RESEARCH_WORDS.some((word) => titleLower.includes(word) || category.includes(word))) {
    return "Research & Breakthroughs";
  }
  if (inTitleOrBody(BUSINESS_WORDS)) {
    return "Industry & Business";
  }
  if (inTitleOrBody(POLICY_WORDS)) {
    return "Policy & Governance";
  }
  return "Deployments & Implementations";
}

export function usageDelta(before: UsageStats, after: UsageStats): Pick<GenerationStats, "tokensUsed" | "apiCalls" | "costEstimate"> {
  return {
    tokensUsed: after.totalTokens - before.totalTokens,
    apiCalls: after.apiCalls - before.apiCalls,
    costEstimate: after.estimatedCost - before.estimatedCost,
  };
}

export interface GenerateShowNotesInput {
  provider: LLMProvider;
  articles: RunArticle[];
  runDate: string;
  loadContent?: ContentLoader;
  now?: Date;
}

export async function generateShowNotes(
  input: GenerateShowNotesInput
): Promise<{ showNotes: ShowNotes; stats: GenerationStats }> {
  const { provider, articles, runDate } = input;
  const loadContent = input.loadContent ?? loadArticleContent;
  const startedAt = Date.now();
  const usageBefore = provider.getUsageStats();

  const grouped = new Map<SectionTitle, ArticleSummary[]>();

  for (const article of articles) {
    const content = (await loadContent(article.extractedPath)) ?? "";
    const section = categorizeArticle(article.title, content, article.sourceCategory);
    const outlet = article.outlet || "Unknown source";

    let bulletPoints: string[];
    try {
      bulletPoints = await provider.summarizeArticle({
        title: article.title,
        content,
        url: article.canonicalUrl,
        outlet,
        maxBullets: 4,
      });
    } catch (error) {
      logger.warn(`[LLM] Failed to summarize "${article.title}"`, { error: errorMessage(error) });
      bulletPoints = [`Failed to summarize: ${errorMessage(error)}`];
    }

    const summaries = grouped.get(section) ?? [];
    summaries.push({
      articleId: article.id,
      title: article.title,
      url: article.canonicalUrl,
      outlet,
      publishedDate: formatDisplayDate(article.publishedAt),
      bulletPoints,
      category: article.sourceCategory || "unknown",
    });
    grouped.set(section, summaries);
  }

  const sections: ShowNotesSection[] = [];
  for (const title of SECTION_TITLES) {
    const summaries = grouped.get(title);
    if (summaries && summaries.length > 0) {
      sections.push({ title, articles: summaries });
    }
  }

  const showNotes: ShowNotes = {
    runDate,
    sections,
    totalArticles: articles.length,
    generatedAt: input.now ?? new Date(),
  };

  const stats: GenerationStats = {
    articlesProcessed: articles.length,
    ...usageDelta(usageBefore, provider.getUsageStats()),
    processingTime: (Date.now() - startedAt) / 1000,
  };

  logger.info(`[LLM] Show notes: ${articles.length} articles in ${sections.length} sections`, {
    tokensUsed: stats.tokensUsed,
  });
  return { showNotes, stats };
}

export function sectionAnchor(title: string): string {
  return title.toLowerCase().replace(/ /g, "-").replace(/&/g, "and");
}

export function formatShowNotesMarkdown(showNotes: ShowNotes): string {
  const generated = showNotes.generatedAt;
  const lines: string[] = [
    `# AI News Briefing - ${showNotes.runDate}`,
    "",
    `*Generated on ${formatDisplayDate(generated)} at ${pad2(generated.getUTCHours())}:${pad2(generated.getUTCMinutes())} UTC*`,
    "",
    `**${showNotes.totalArticles} stories** across ${showNotes.sections.length} categories`,
    "",
  ];

  if (showNotes.sections.length > 1) {
    lines.push("## Contents", "");
    for (const section of showNotes.sections) {
      lines.push(`- [${section.title}](#${sectionAnchor(section.title)})`);
    }
    lines.push("");
  }

  for (const section of showNotes.sections) {
    lines.push(`## ${section.title}`, "");
    for (const article of section.articles) {
      lines.push(`### [${article.title}](${article.url})`, `*${article.outlet} • ${article.publishedDate}*`, "");
      for (const bullet of article.bulletPoints) {
        lines.push(`- ${bullet}`);
      }
      lines.push("");
    }
  }

  lines.push("---", "", "*This briefing was generated automatically.*", "");
  return lines.join("\n");
}
