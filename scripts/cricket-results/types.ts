import type { RawNode, SourceName } from "../../lib/cricket/types";

export interface CollectorConfig {
  dataDir: string;
  concurrency: number;
  series: {
    id: string;
    slug: string;
    name: string;
  };
  cricketdata: { baseUrl: string; apiKey: string | null };
  espncricinfo: { baseUrl: string; siteUrl: string };
  sportmonks: { baseUrl: string; apiToken: string | null };
}

export interface RunContext {
  dryRun: boolean;
  runId: string;
  dataDir: string;
  startedAt: Date;
  dayStamp: string;
  logLines: string[];
  config: CollectorConfig;
}

export interface MatchSource {
  name: SourceName;
  /** False when listing entries carry no usable start date. */
  listingHasDates: boolean;
  fetchMatchList(ctx: RunContext): Promise<RawNode[]>;
  fetchMatchDetail(stub: RawNode, ctx: RunContext): Promise<RawNode | null>;
}

export interface CliOptions {
  source: SourceName | null;
  date: string | null;
  match: string | null;
  allTournaments: boolean;
  includeLive: boolean;
  dryRun: boolean;
  help: boolean;
}
