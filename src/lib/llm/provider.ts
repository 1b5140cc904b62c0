/**
 * LLM providers for article summaries and narration scripts
 *
 * OpenAIProvider calls chat completions and tracks token usage and cost.
 * MockLLMProvider returns canned text and is used when no API key is configured.
 */

import OpenAI from "openai";
import { type LlmSettings, type Settings, getLlmApiKey } from "../../config/settings";
import { logger } from "../logger";

export interface UsageStats {
  totalTokens: number;
  apiCalls: number;
  estimatedCost: number;
  model: string;
}

export interface SummarizeRequest {
  title: string;
  content: string;
  url: string;
  outlet: string;
  maxBullets?: number;
}

export interface ScriptRequest {
  showNotes: string;
  targetMinutes: number;
  runDate: string;
}

export interface LLMProvider {
  summarizeArticle(request: SummarizeRequest): Promise<string[]>;
  generateScript(request: ScriptRequest): Promise<string>;
  /** Cumulative since construction */
  getUsageStats(): UsageStats;
}

export const WORDS_PER_MINUTE = 160;
const MAX_CONTENT_CHARS = 8000;

/** USD per 1K tokens */
const COST_PER_1K_TOKENS: Record<string, { input: number; output: number }> = {
  "gpt-4o": { input: 0.005, output: 0.015 },
  "gpt-4o-mini": { input: 0.00015, output: 0.0006 },
  "gpt-4": { input: 0.03, output: 0.06 },
  "gpt-3.5-turbo": { input: 0.001, output: 0.002 },
};

export function estimateCost(model: string, promptTokens: number, completionTokens: number): number {
  const rates = COST_PER_1K_TOKENS[model];
  if (!rates) {
    return 0;
  }
  return (promptTokens / 1000) * rates.input + (completionTokens / 1000) * rates.output;
}

/**
 * Bullet lines (•, -, *) with the marker removed; the whole reply when none are found
 */
export function parseBullets(reply: string, maxBullets: number): string[] {
  const text = reply.trim();
  const bullets: string[] = [];

  for (const raw of text.split("\n")) {
    const line = raw.trim();
    if (line.startsWith("•") || line.startsWith("-") || line.startsWith("*")) {
      const bullet = line.slice(1).trim();
      if (bullet) {
        bullets.push(bullet);
      }
    }
  }

  if (bullets.length === 0 && text) {
    bullets.push(text);
  }
  return bullets.slice(0, maxBullets);
}

export function buildSummaryPrompt(request: SummarizeRequest, maxBullets: number): string {
  const content =
    request.content.length > MAX_CONTENT_CHARS
      ? `${request.content.slice(0, MAX_CONTENT_CHARS)}...`
      : request.content;

  return `Please summarize this AI/technology article into ${maxBullets} clear, informative bullet points.

Article Title: ${request.title}
Source: ${request.outlet}
URL: ${request.url}

Article Content:
${content}

Instructions:
- Focus on practical implications, technical details, and business impact
- Each bullet should be 1-2 sentences maximum
- Avoid marketing fluff and focus on concrete developments
- If it's about a product launch, include key capabilities and availability
- If it's research, include key findings and implications
- If it's business news, include scale, partnerships, or strategic implications

Format as a simple bulleted list:
• Point 1
• Point 2
• Point 3
• Point 4 (if applicable)`;
}

export function buildScriptPrompt(request: ScriptRequest): string {
  const targetWords = request.targetMinutes * WORDS_PER_MINUTE;

  return `Create a podcast script for an AI/technology news briefing based on these show notes.

Show Notes:
${request.showNotes}

Requirements:
- Target length: approximately ${targetWords} words (${request.targetMinutes} minutes when read aloud)
- Professional, conversational tone suitable for audio
- Clear transitions between topics
- Start with a brief intro mentioning the date (${request.runDate}) and what's covered
- End with a short conclusion and mention of show notes availability
- Use natural language that flows well when spoken
- Group related stories together logically
- Reference "show notes" for detailed links, not specific URLs
- Keep paragraphs short for easy reading

Format as a clean script without special formatting or stage directions.`;
}

export class OpenAIProvider implements LLMProvider {
  private readonly client: OpenAI;
  private totalTokens = 0;
  private apiCalls = 0;
  private cost = 0;

  constructor(
    apiKey: string,
    private readonly model: string = "gpt-4o-mini",
    baseUrl?: string
  ) {
    this.client = new OpenAI({ apiKey, baseURL: baseUrl });
  }

  private async complete(prompt: string, temperature: number, maxTokens: number): Promise<string> {
    this.apiCalls++;
    const response = await this.client.chat.completions.create({
      model: this.model,
      messages: [{ role: "user", content: prompt }],
      temperature,
      max_tokens: maxTokens,
    });

    if (response.usage) {
      this.totalTokens += response.usage.total_tokens;
      this.cost += estimateCost(this.model, response.usage.prompt_tokens, response.usage.completion_tokens);
    }

    const content = response.choices[0]?.message?.content;
    if (!content) {
      throw new Error("Empty completion from OpenAI");
    }
    return content.trim();
  }

  async summarizeArticle(request: SummarizeRequest): Promise<string[]> {
    const maxBullets = request.maxBullets ?? 4;
    const reply = await this.complete(buildSummaryPrompt(request, maxBullets), 0.3, 300);
    return parseBullets(reply, maxBullets);
  }

  async generateScript(request: ScriptRequest): Promise<string> {
    const targetWords = request.targetMinutes * WORDS_PER_MINUTE;
    logger.info(`[LLM] Generating script (~${targetWords} words) with ${this.model}`);
    return this.complete(buildScriptPrompt(request), 0.4, Math.min(targetWords + 200, 4000));
  }

  getUsageStats(): UsageStats {
    return {
      totalTokens: this.totalTokens,
      apiCalls: this.apiCalls,
      estimatedCost: this.cost,
      model: this.model,
    };
  }
}

export type MockCall = { kind: "summarize"; title: string } | { kind: "script"; targetMinutes: number };

export class MockLLMProvider implements LLMProvider {
  readonly calls: MockCall[] = [];

  async summarizeArticle(request: SummarizeRequest): Promise<string[]> {
    this.calls.push({ kind: "summarize", title: request.title });
    return [
      `Mock summary of '${request.title.slice(0, 50)}...'`,
      `Published by ${request.outlet}`,
      "Key technical details and implications",
      "Business impact and next steps",
    ].slice(0, request.maxBullets ?? 4);
  }

  async generateScript(request: ScriptRequest): Promise<string> {
    this.calls.push({ kind: "script", targetMinutes: request.targetMinutes });
    return `Welcome to your AI news briefing for ${request.runDate}.

Today we're covering ${request.targetMinutes} minutes of the latest developments in artificial intelligence and technology.

Our first story covers the most important development of the day.

Moving on to our next development, there is more to cover.

That wraps up today's briefing. You can find detailed links and references in the show notes.

Thank you for listening, and we'll see you next time.`;
  }

  getUsageStats(): UsageStats {
    return {
      totalTokens: this.calls.length * 100,
      apiCalls: this.calls.length,
      estimatedCost: 0,
      model: "mock",
    };
  }
}

export function createLLMProvider(settings: Settings): LLMProvider {
  const llm: LlmSettings = settings.llm;
  if (llm.provider === "mock") {
    return new MockLLMProvider();
  }

  const apiKey = getLlmApiKey(settings);
  if (!apiKey) {
    logger.warn(`[LLM] ${llm.apiKeyEnv} not set, using mock provider`);
    return new MockLLMProvider();
  }

  return new OpenAIProvider(apiKey, llm.model, llm.baseUrl);
}
