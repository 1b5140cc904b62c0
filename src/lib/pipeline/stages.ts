/**
 * Pipeline stages
 *
 * Each stage moves not_started -> running -> succeeded | failed exactly once.
 * Any other transition throws.
 */

export const STAGE_DEFINITIONS = [
  { name: "sources", description: "Loading and syncing sources" },
  { name: "rss", description: "Fetching RSS feeds" },
  { name: "articles", description: "Fetching and extracting articles" },
  { name: "storage", description: "Storing articles with deduplication" },
  { name: "ranking", description: "Ranking and selecting stories" },
  { name: "show_notes", description: "Generating show notes" },
  { name: "script", description: "Generating narration script" },
] as const;

export type StageName = (typeof STAGE_DEFINITIONS)[number]["name"];

export type StageStats = Record<string, unknown>;

export type StageState =
  | { status: "not_started" }
  | { status: "running"; startedAt: Date }
  | { status: "succeeded"; startedAt: Date; endedAt: Date; stats: StageStats }
  | { status: "failed"; startedAt: Date; endedAt: Date; error: string };

export type StageStatus = StageState["status"];

export type Clock = () => Date;

export const systemClock: Clock = () => new Date();

export class PipelineStage {
  private current: StageState = { status: "not_started" };

  constructor(
    readonly name: StageName,
    readonly description: string,
    private readonly clock: Clock = systemClock
  ) {}

  get state(): StageState {
    return this.current;
  }

  get status(): StageStatus {
    return this.current.status;
  }

  get success(): boolean {
    return this.current.status === "succeeded";
  }

  get startedAt(): Date | undefined {
    return this.current.status === "not_started" ? undefined : this.current.startedAt;
  }

  get endedAt(): Date | undefined {
    return this.current.status === "succeeded" || this.current.status === "failed"
      ? this.current.endedAt
      : undefined;
  }

  get stats(): StageStats {
    return this.current.status === "succeeded" ? this.current.stats : {};
  }

  get error(): string | undefined {
    return this.current.status === "failed" ? this.current.error : undefined;
  }

  /** Seconds; 0 until the stage is terminal */
  get duration(): number {
    const { startedAt, endedAt } = this;
    if (!startedAt || !endedAt) {
      return 0;
    }
    return (endedAt.getTime() - startedAt.getTime()) / 1000;
  }

  start(): void {
    if (this.current.status !== "not_started") {
      throw new Error(`Stage ${this.name} cannot start from ${this.current.status}`);
    }
    this.current = { status: "running", startedAt: this.clock() };
  }

  complete(stats: StageStats = {}): void {
    if (this.current.status !== "running") {
      throw new Error(`Stage ${this.name} cannot complete from ${this.current.status}`);
    }
    this.current = {
      status: "succeeded",
      startedAt: this.current.startedAt,
      endedAt: this.clock(),
      stats,
    };
  }

  fail(error: string): void {
    if (this.current.status !== "running") {
      throw new Error(`Stage ${this.name} cannot fail from ${this.current.status}`);
    }
    this.current = {
      status: "failed",
      startedAt: this.current.startedAt,
      endedAt: this.clock(),
      error,
    };
  }
}

export function createStages(clock: Clock = systemClock): PipelineStage[] {
  return STAGE_DEFINITIONS.map((def) => new PipelineStage(def.name, def.description, clock));
}

export function pipelineStatus(stages: PipelineStage[]): "success" | "failed" {
  return stages.length > 0 && stages.every((stage) => stage.success) ? "success" : "failed";
}
