/**
 * Tests for show notes categorisation, generation and markdown rendering
 */

import { describe, it, expect } from "vitest";
import type { RunArticle, ShowNotes } from "@/src/lib/model";
import { MockLLMProvider, type SummarizeRequest } from "@/src/lib/llm/provider";
import {
  categorizeArticle,
  formatDisplayDate,
  formatShowNotesMarkdown,
  generateShowNotes,
  sectionAnchor,
} from "@/src/lib/pipeline/showNotes";

const NOW = new Date("2025-01-10T07:04:00Z");

function createMockRunArticle(overrides: Partial<RunArticle> = {}): RunArticle {
  return {
    id: 1,
    sourceId: 1,
    sourceName: "Test Source",
    sourceWeight: 0.8,
    sourceCategory: "industry",
    canonicalUrl: "https://example.com/a",
    title: "Company deploys agents",
    outlet: "example.com",
    contentHash: "hash-1",
    publishedAt: new Date("2025-01-05T10:00:00Z"),
    firstSeenAt: NOW,
    lastSeenAt: NOW,
    includedInRank: true,
    score: null,
    ...overrides,
  };
}

class FailingProvider extends MockLLMProvider {
  async summarizeArticle(request: SummarizeRequest): Promise<string[]> {
    if (request.title.includes("Broken")) {
      throw new Error("quota exceeded");
    }
    return super.summarizeArticle(request);
  }
}

describe("formatDisplayDate", () => {
  it("should format in UTC with a padded day", () => {
    expect(formatDisplayDate(new Date("2025-01-05T23:30:00Z"))).toBe("Jan 05, 2025");
  });

  it("should report unknown dates", () => {
    expect(formatDisplayDate(undefined)).toBe("Unknown date");
    expect(formatDisplayDate(new Date("not a date"))).toBe("Unknown date");
  });
});

describe("categorizeArticle", () => {
  it("should put deployment stories first", () => {
    expect(categorizeArticle("Company deploys agents", "", "industry")).toBe("Deployments & Implementations");
  });

  it("should detect product launches from the title", () => {
    expect(categorizeArticle("OpenAI unveils new model", "", "industry")).toBe("Product Launches & Updates");
  });

  it("should detect research from the title or source category", () => {
    expect(categorizeArticle("A new study of transformers", "", "general")).toBe("Research & Breakthroughs");
    expect(categorizeArticle("Weekly roundup", "", "Research")).toBe("Research & Breakthroughs");
  });

  it("should detect business stories from the body", () => {
    expect(categorizeArticle("Startup raises money", "The funding round was large.", "general")).toBe(
      "Industry & Business"
    );
  });

  it("should detect policy stories", () => {
    expect(categorizeArticle("Senate debates AI rules", "", "general")).toBe("Policy & Governance");
  });

  it("should only scan the opening of the body", () => {
    expect(categorizeArticle("Weekly roundup", `${"x".repeat(480)} regulation`, "general")).toBe("Policy & Governance");
    expect(categorizeArticle("Weekly roundup", `${"x".repeat(500)} regulation`, "general")).toBe(
      "Deployments & Implementations"
    );
  });
});

describe("sectionAnchor", () => {
  it("should build markdown anchors", () => {
    expect(sectionAnchor("Deployments & Implementations")).toBe("deployments-and-implementations");
  });
});

describe("generateShowNotes", () => {
  it("should group articles by section in fixed order", async () => {
    const provider = new MockLLMProvider();
    const { showNotes, stats } = await generateShowNotes({
      provider,
      runDate: "2025-01-10",
      now: NOW,
      loadContent: async () => null,
      articles: [
        createMockRunArticle({ id: 2, title: "OpenAI unveils new model", outlet: undefined, publishedAt: undefined, sourceCategory: "" }),
        createMockRunArticle({ id: 1 }),
      ],
    });

    expect(showNotes.sections.map((s) => s.title)).toEqual(["Deployments & Implementations", "Product Launches & Updates"]);
    expect(showNotes.totalArticles).toBe(2);
    expect(showNotes.generatedAt).toBe(NOW);
    expect(showNotes.sections[1].articles[0]).toEqual({
      articleId: 2,
      title: "OpenAI unveils new model",
      url: "https://example.com/a",
      outlet: "Unknown source",
      publishedDate: "Unknown date",
      bulletPoints: [
        "Mock summary of 'OpenAI unveils new model...'",
        "Published by Unknown source",
        "Key technical details and implications",
        "Business impact and next steps",
      ],
      category: "unknown",
    });
    expect(stats.articlesProcessed).toBe(2);
    expect(stats.tokensUsed).toBe(200);
    expect(stats.apiCalls).toBe(2);
  });

  it("should keep an article whose summary failed", async () => {
    const { showNotes, stats } = await generateShowNotes({
      provider: new FailingProvider(),
      runDate: "2025-01-10",
      now: NOW,
      loadContent: async () => null,
      articles: [createMockRunArticle({ title: "Broken deploy story" })],
    });

    expect(showNotes.sections[0].articles[0].bulletPoints).toEqual(["Failed to summarize: quota exceeded"]);
    expect(stats.apiCalls).toBe(0);
  });

  it("should categorise with the loaded article body", async () => {
    const { showNotes } = await generateShowNotes({
      provider: new MockLLMProvider(),
      runDate: "2025-01-10",
      now: NOW,
      loadContent: async (path) => (path === "/tmp/b.txt" ? "New regulation was passed." : null),
      articles: [createMockRunArticle({ title: "Weekly roundup", sourceCategory: "general", extractedPath: "/tmp/b.txt" })],
    });

    expect(showNotes.sections.map((s) => s.title)).toEqual(["Policy & Governance"]);
  });
});

describe("formatShowNotesMarkdown", () => {
  it("should render the header, contents and sections", () => {
    const showNotes: ShowNotes = {
      runDate: "2025-01-10",
      totalArticles: 2,
      generatedAt: NOW,
      sections: [
        {
          title: "Deployments & Implementations",
          articles: [
            {
              articleId: 1,
              title: "Company deploys agents",
              url: "https://example.com/a",
              outlet: "example.com",
              publishedDate: "Jan 05, 2025",
              bulletPoints: ["b1"],
              category: "industry",
            },
          ],
        },
        {
          title: "Product Launches & Updates",
          articles: [
            {
              articleId: 2,
              title: "OpenAI unveils new model",
              url: "https://example.com/b",
              outlet: "Unknown source",
              publishedDate: "Unknown date",
              bulletPoints: ["b2", "b3"],
              category: "unknown",
            },
          ],
        },
      ],
    };

    expect(formatShowNotesMarkdown(showNotes)).toBe(
      [
        "# AI News Briefing - 2025-01-10",
        "",
        "*Generated on Jan 10, 2025 at 07:04 UTC*",
        "",
        "**2 stories** across 2 categories",
        "",
        "## Contents",
        "",
        "- [Deployments & Implementations](#deployments-and-implementations)",
        "- [Product Launches & Updates](#product-launches-and-updates)",
        "",
        "## Deployments & Implementations",
        "",
        "### [Company deploys agents](https://example.com/a)",
        "*example.com • Jan 05, 2025*",
        "",
        "- b1",
        "",
        "## Product Launches & Updates",
        "",
        "### [OpenAI unveils new model](https://example.com/b)",
        "*Unknown source • Unknown date*",
        "",
        "- b2",
        "- b3",
        "",
        "---",
        "",
        "*This briefing was generated automatically.*",
        "",
      ].join("\n")
    );
  });

  it("should skip the contents list for a single section", () => {
    const markdown = formatShowNotesMarkdown({
      runDate: "2025-01-10",
      totalArticles: 0,
      generatedAt: NOW,
      sections: [{ title: "Policy & Governance", articles: [] }],
    });

    expect(markdown.split("\n").slice(4, 8)).toEqual(["**0 stories** across 1 categories", "", "## Policy & Governance", ""]);
  });
});
