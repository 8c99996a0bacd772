import type { BowlingEntry, CanonicalMatchRecord } from "./types";

export type SummaryFormatOptions = {
  topBatters?: number;
  topBowlers?: number;
};

/** Most wickets first, cheaper economy breaking ties. Returns a copy. */
export function sortBowlingForDisplay(bowling: readonly BowlingEntry[]): BowlingEntry[] {
  return [...bowling].sort((a, b) => b.wickets - a.wickets || a.economy - b.economy);
}

export function formatMatchSummary(record: CanonicalMatchRecord, options: SummaryFormatOptions = {}): string[] {
  const topBatters = options.topBatters ?? 5;
  const topBowlers = options.topBowlers ?? 3;
  const lines: string[] = [record.title || record.match_id];

  lines.push(`Venue: ${[record.venue, record.city].filter(Boolean).join(", ")}`);
  lines.push(`Date: ${record.start_date}`);
  if ("winner" in record.toss) {
    lines.push(`Toss: ${record.toss.winner} won, chose to ${record.toss.decision}`);
  }
  lines.push(`Result: ${record.status}`);

  for (const innings of record.innings) {
    lines.push(`${innings.team}: ${innings.runs}/${innings.wickets} (${innings.overs} ov)`);
    for (const batter of innings.batting.slice(0, topBatters)) {
      const notOut = batter.dismissal === "not out" ? "*" : "";
      lines.push(
        `  ${batter.name} ${batter.runs}${notOut} (${batter.balls}) 4s:${batter.fours} 6s:${batter.sixes} SR:${batter.strike_rate.toFixed(1)}`
      );
    }
    for (const bowler of sortBowlingForDisplay(innings.bowling).slice(0, topBowlers)) {
      lines.push(
        `  ${bowler.name} ${bowler.wickets}/${bowler.runs} (${bowler.overs} ov) Econ:${bowler.economy.toFixed(2)}`
      );
    }
  }

  if (record.player_of_match) {
    lines.push(`Player of the Match: ${record.player_of_match}`);
  }
  return lines;
}
