/**
 * Pipeline reporting: pipeline_stats.json payload and the end-of-run summary table
 */

import { type PipelineStage, pipelineStatus } from "./stages";

export interface StageReport {
  status: string;
  success: boolean;
  duration: number;
  error: string | null;
  stats: Record<string, unknown>;
}

export interface PipelineReport {
  pipeline: {
    runDate: string;
    runId: number | null;
    status: "success" | "failed";
    totalDuration: number;
    completedAt: string;
  };
  stages: Record<string, StageReport>;
}

export function buildPipelineReport(
  stages: PipelineStage[],
  options: { runDate: string; runId?: number; totalDuration: number; completedAt: Date }
): PipelineReport {
  const stageReports: Record<string, StageReport> = {};
  for (const stage of stages) {
    stageReports[stage.name] = {
      status: stage.status,
      success: stage.success,
      duration: stage.duration,
      error: stage.error ?? null,
      stats: stage.stats,
    };
  }

  return {
    pipeline: {
      runDate: options.runDate,
      runId: options.runId ?? null,
      status: pipelineStatus(stages),
      totalDuration: options.totalDuration,
      completedAt: options.completedAt.toISOString(),
    },
    stages: stageReports,
  };
}

function num(stats: Record<string, unknown>, key: string): number {
  const value = stats[key];
  return typeof value === "number" ? value : 0;
}

/**
 * One-line detail per stage for the summary table
 */
export function stageDetails(stage: PipelineStage): string {
  if (stage.status === "failed") {
    return stage.error || "Failed";
  }
  if (stage.status === "not_started") {
    return "not run";
  }
  if (stage.status !== "succeeded") {
    return "";
  }

  const stats = stage.stats;
  switch (stage.name) {
    case "sources":
      return `${num(stats, "enabledSources")}/${num(stats, "totalSources")} sources enabled`;
    case "rss":
      return `${num(stats, "totalFeeds")} feeds, ${num(stats, "totalItems")} items`;
    case "articles":
      return `${num(stats, "successful")} articles fetched`;
    case "storage":
      return `${num(stats, "new")} new, ${num(stats, "duplicates")} duplicates`;
    case "ranking":
      return `${num(stats, "selected")} stories selected`;
    case "show_notes":
    case "script":
      return `${num(stats, "tokensUsed")} tokens, $${num(stats, "costEstimate").toFixed(3)}`;
  }
}

const STATUS_MARKS: Record<string, string> = {
  succeeded: "✓",
  failed: "✗",
  running: "…",
  not_started: "-",
};

export function formatSummaryTable(stages: PipelineStage[]): string[] {
  const rows = stages.map((stage) => [
    stage.name,
    STATUS_MARKS[stage.status] ?? stage.status,
    stage.duration > 0 ? `${stage.duration.toFixed(1)}s` : "-",
    stageDetails(stage),
  ]);
  const header = ["Stage", "Status", "Duration", "Details"];
  const widths = header.map((h, i) => Math.max(h.length, ...rows.map((row) => row[i].length)));
  const render = (cells: string[]) =>
    cells
      .map((cell, i) => (i === cells.length - 1 ? cell : cell.padEnd(widths[i])))
      .join("  ")
      .trimEnd();

  return [render(header), render(widths.map((w) => "-".repeat(w))), ...rows.map(render)];
}

export function formatOutcome(
  stages: PipelineStage[],
  options: { runDate: string; totalDuration: number; runDir: string }
): string[] {
  if (pipelineStatus(stages) === "success") {
    return [
      "Pipeline completed successfully",
      `Run date: ${options.runDate}`,
      `Duration: ${options.totalDuration.toFixed(1)} seconds`,
      `Output directory: ${options.runDir}`,
      "Generated files: show_notes.md, script.txt, script_tts_<DD-HH-mm>.txt, pipeline_stats.json",
    ];
  }

  const failed = stages.filter((s) => s.status === "failed").map((s) => s.name);
  const skipped = stages.filter((s) => s.status === "not_started").map((s) => s.name);
  return [
    "Pipeline failed",
    `Failed stages: ${failed.length > 0 ? failed.join(", ") : "none"}`,
    `Not run: ${skipped.length > 0 ? skipped.join(", ") : "none"}`,
    `Duration: ${options.totalDuration.toFixed(1)} seconds`,
  ];
}
