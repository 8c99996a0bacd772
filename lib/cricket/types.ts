export type RawNode = unknown;

export type SourceName = "cricketdata" | "espncricinfo" | "espn-html" | "sportmonks";

export interface Toss {
  winner: string;
  decision: string;
}

export interface TeamRef {
  name: string;
  short_name: string;
}

export interface BattingEntry {
  name: string;
  runs: number;
  balls: number;
  fours: number;
  sixes: number;
  strike_rate: number;
  dismissal: string;
}

export interface BowlingEntry {
  name: string;
  overs: number;
  maidens: number;
  runs: number;
  wickets: number;
  economy: number;
}

export interface Innings {
  team: string;
  runs: number;
  wickets: number;
  overs: number;
  extras?: number;
  batting: BattingEntry[];
  bowling: BowlingEntry[];
  fall_of_wickets?: unknown[];
}

export interface CanonicalMatchRecord {
  match_id: string;
  title: string;
  series: string;
  venue: string;
  city?: string;
  start_date: string;
  status: string;
  is_completed: boolean;
  toss: Toss | Record<string, never>;
  teams: TeamRef[];
  innings: Innings[];
  player_of_match: string;
}

export interface DailySummary {
  date: string;
  run_time: string;
  total_matches: number;
  matches: CanonicalMatchRecord[];
}
