import { toCalendarDate } from "./dates";
import { isCompleted } from "./status";
import { readSummary, type MatchSummaryFields } from "./summary";
import type { RawNode } from "./types";

export { isCompleted } from "./status";

export const DEFAULT_TOURNAMENT_MARKERS: readonly string[] = ["t20 world cup", "icc men's t20", "icc t20"];

export const DEFAULT_WARM_UP_MARKERS: readonly string[] = ["warm-up", "warm up", "warmup", "practice"];

/**
 * Each field switches one predicate on. A match is selected when every
 * enabled predicate holds.
 */
export interface SelectionCriteria {
  tournament?: { markers: readonly string[] };
  excludeWarmUp?: { markers: readonly string[] };
  date?: string;
  namedFixture?: string;
  completedOnly?: boolean;
  processed?: ReadonlySet<string>;
}

export type PredicateName =
  | "tournament"
  | "warm_up"
  | "date"
  | "named_fixture"
  | "completed"
  | "already_processed";

/** Why a listing entry was dropped; `duplicate` repeats an id seen earlier in the same list. */
export type SkipReason = PredicateName | "duplicate";

export type SelectionVerdict<T> = { match: T; id: string; reason: SkipReason | null };

function containsAny(texts: readonly string[], markers: readonly string[]) {
  const lowered = texts.map((text) => text.toLowerCase());
  return markers.some((marker) => {
    const needle = marker.toLowerCase();
    return needle.length > 0 && lowered.some((text) => text.includes(needle));
  });
}

export function isTournamentMatch(
  seriesText: string,
  titleText: string,
  markers: readonly string[] = DEFAULT_TOURNAMENT_MARKERS
): boolean {
  return containsAny([seriesText, titleText], markers);
}

export function isWarmUp(
  titleText: string,
  seriesText: string,
  markers: readonly string[] = DEFAULT_WARM_UP_MARKERS
): boolean {
  return containsAny([titleText, seriesText], markers);
}

/** Calendar-date equality. Anything unparseable on either side is a miss. */
export function matchesDate(matchDate: unknown, targetDate: unknown): boolean {
  const left = toCalendarDate(matchDate);
  const right = toCalendarDate(targetDate);
  return left !== null && right !== null && left === right;
}

export function matchesNamedFixture(titleText: string, targetName: string): boolean {
  const needle = targetName.trim().toLowerCase();
  if (!needle) return true;
  return titleText.toLowerCase().includes(needle);
}

export function isNotAlreadyProcessed(matchId: string, processed: ReadonlySet<string>): boolean {
  return !processed.has(matchId);
}

type Check = {
  name: PredicateName;
  enabled: (criteria: SelectionCriteria) => boolean;
  passes: (fields: MatchSummaryFields, criteria: SelectionCriteria) => boolean;
};

// Cheapest first; evaluation stops at the first failure.
const CHECKS: Check[] = [
  {
    name: "already_processed",
    enabled: (c) => c.processed !== undefined,
    passes: (f, c) => isNotAlreadyProcessed(f.id, c.processed ?? new Set()),
  },
  {
    name: "tournament",
    enabled: (c) => c.tournament !== undefined,
    passes: (f, c) => isTournamentMatch(f.series, f.title, c.tournament?.markers),
  },
  {
    name: "warm_up",
    enabled: (c) => c.excludeWarmUp !== undefined,
    passes: (f, c) => !isWarmUp(f.title, f.series, c.excludeWarmUp?.markers),
  },
  {
    name: "completed",
    enabled: (c) => c.completedOnly === true,
    passes: (f) => isCompleted(f.status, f.ended),
  },
  {
    name: "named_fixture",
    enabled: (c) => c.namedFixture !== undefined,
    passes: (f, c) => matchesNamedFixture(f.title, c.namedFixture ?? ""),
  },
  {
    name: "date",
    enabled: (c) => c.date !== undefined,
    passes: (f, c) => matchesDate(f.startDate, c.date),
  },
];

/** Name of the first enabled predicate the match fails, or null when selected. */
export function explainSelection(rawMatch: RawNode, criteria: SelectionCriteria): PredicateName | null {
  const fields = readSummary(rawMatch);
  for (const check of CHECKS) {
    if (check.enabled(criteria) && !check.passes(fields, criteria)) return check.name;
  }
  return null;
}

export function isSelected(rawMatch: RawNode, criteria: SelectionCriteria): boolean {
  return explainSelection(rawMatch, criteria) === null;
}

/**
 * One verdict per entry, in input order. Entries sharing a match id collapse
 * to the first one that passes every predicate.
 */
export function explainSelections<T extends RawNode>(
  rawMatches: readonly T[],
  criteria: SelectionCriteria
): SelectionVerdict<T>[] {
  const kept = new Set<string>();
  return rawMatches.map((match) => {
    const id = readSummary(match).id;
    let reason: SkipReason | null = explainSelection(match, criteria);
    if (!reason && id) {
      if (kept.has(id)) reason = "duplicate";
      else kept.add(id);
    }
    return { match, id, reason };
  });
}

/** Stable filter: the selected matches keep their input order, one per match id. */
export function selectMatches<T extends RawNode>(rawMatches: readonly T[], criteria: SelectionCriteria): T[] {
  return explainSelections(rawMatches, criteria)
    .filter((verdict) => verdict.reason === null)
    .map((verdict) => verdict.match);
}
