import {
  BATTING_PATHS,
  BOWLING_PATHS,
  DETAIL_MATCH_WRAPPERS,
  INNINGS_LOCATIONS,
  INNINGS_PATHS,
  MATCH_PATHS,
  NON_PLAYER_MARKERS,
  PLAYER_OF_MATCH_AWARD_TYPES,
  PLAYER_OF_MATCH_PATHS,
  SCOREBOARD_PATHS,
  TOSS_PATHS,
} from "./fieldPaths";
import { NormalizationError, missingIdentifier } from "./errors";
import {
  isRecord,
  resolveDecimal,
  resolveInt,
  resolveList,
  resolveRecord,
  resolveString,
  resolveStringFrom,
  traverse,
} from "./resolve";
import { readSummary, readTeams } from "./summary";
import type {
  BattingEntry,
  BowlingEntry,
  CanonicalMatchRecord,
  Innings,
  RawNode,
  TeamRef,
  Toss,
} from "./types";

export type NormalizeResult =
  | { ok: true; record: CanonicalMatchRecord }
  | { ok: false; error: NormalizationError };

// ESPNcricinfo encodes the toss choice as a number.
const TOSS_CHOICES: Record<string, string> = { "1": "bat", "2": "field" };

function deepFreeze<T>(value: T): T {
  if (typeof value === "object" && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}

function cleanTeamLabel(value: string) {
  return value.replace(/\s+inning(s)?\s+\d+$/i, "").trim();
}

export function isNonPlayerRow(name: string) {
  const lowered = name.toLowerCase();
  return NON_PLAYER_MARKERS.some((marker) => lowered.includes(marker));
}

function didNotBat(row: RawNode) {
  return BATTING_PATHS.didNotBat.some((path) => {
    const value = traverse(row, path);
    return typeof value === "string" && value.trim().toUpperCase() === "DNB";
  });
}

export function normalizeBattingRow(row: RawNode): BattingEntry | null {
  const name = resolveString(row, BATTING_PATHS.name);
  if (!name || isNonPlayerRow(name) || didNotBat(row)) return null;
  return {
    name,
    runs: resolveInt(row, BATTING_PATHS.runs),
    balls: resolveInt(row, BATTING_PATHS.balls),
    fours: resolveInt(row, BATTING_PATHS.fours),
    sixes: resolveInt(row, BATTING_PATHS.sixes),
    strike_rate: resolveDecimal(row, BATTING_PATHS.strikeRate),
    dismissal: resolveString(row, BATTING_PATHS.dismissal, "not out"),
  };
}

export function normalizeBowlingRow(row: RawNode): BowlingEntry | null {
  const name = resolveString(row, BOWLING_PATHS.name);
  if (!name) return null;
  return {
    name,
    overs: resolveDecimal(row, BOWLING_PATHS.overs),
    maidens: resolveInt(row, BOWLING_PATHS.maidens),
    runs: resolveInt(row, BOWLING_PATHS.runs),
    wickets: resolveInt(row, BOWLING_PATHS.wickets),
    economy: resolveDecimal(row, BOWLING_PATHS.economy),
  };
}

function normalizeRows<T>(rows: unknown[], normalizeRow: (row: RawNode) => T | null): T[] {
  return rows.map(normalizeRow).filter((entry): entry is T => entry !== null);
}

function buildInnings(
  node: RawNode,
  team: string,
  battingRows: unknown[],
  bowlingRows: unknown[]
): Innings {
  const innings: Innings = {
    team,
    runs: resolveInt(node, INNINGS_PATHS.runs),
    wickets: resolveInt(node, INNINGS_PATHS.wickets),
    overs: resolveDecimal(node, INNINGS_PATHS.overs),
    batting: normalizeRows(battingRows, normalizeBattingRow),
    bowling: normalizeRows(bowlingRows, normalizeBowlingRow),
  };
  const extras = resolveInt(node, INNINGS_PATHS.extras, -1);
  if (extras >= 0) innings.extras = extras;
  const fallOfWickets = resolveList(node, INNINGS_PATHS.fallOfWickets);
  // copied so freezing the record leaves the payload alone
  if (fallOfWickets.length) innings.fall_of_wickets = structuredClone(fallOfWickets);
  return innings;
}

export function normalizeInnings(node: RawNode): Innings {
  return buildInnings(
    node,
    cleanTeamLabel(resolveString(node, INNINGS_PATHS.team)),
    resolveList(node, INNINGS_PATHS.batting),
    resolveList(node, INNINGS_PATHS.bowling)
  );
}

function teamNamesById(detail: RawNode): Map<string, string> {
  const names = new Map<string, string>();
  for (const path of ["localteam", "visitorteam"]) {
    const team = resolveRecord(detail, [path]);
    if (!team) continue;
    const id = resolveString(team, ["id"]);
    const name = resolveString(team, ["name"]);
    if (id && name) names.set(id, name);
  }
  return names;
}

function scoreboardInnings(detail: RawNode): Innings[] {
  const boards = resolveList(detail, SCOREBOARD_PATHS.boards).filter(
    (board) => resolveString(board, SCOREBOARD_PATHS.type).toLowerCase() === "total"
  );
  if (!boards.length) return [];
  const teams = teamNamesById(detail);
  const batting = resolveList(detail, SCOREBOARD_PATHS.batting);
  const bowling = resolveList(detail, SCOREBOARD_PATHS.bowling);
  const belongsTo = (key: string) => (row: unknown) => resolveString(row, SCOREBOARD_PATHS.key) === key;

  return boards.map((board) => {
    const key = resolveString(board, SCOREBOARD_PATHS.key);
    const teamId = resolveString(board, SCOREBOARD_PATHS.teamId);
    return buildInnings(
      board,
      teams.get(teamId) ?? teamId,
      key ? batting.filter(belongsTo(key)) : [],
      key ? bowling.filter(belongsTo(key)) : []
    );
  });
}

/**
 * Finds the innings-bearing list in a detail payload. Known locations are
 * tried in order and the first non-empty list wins; Sportmonks scoreboards
 * are the last resort.
 */
export function extractInnings(detail: RawNode): Innings[] {
  const located = resolveList(detail, INNINGS_LOCATIONS);
  if (located.length) return located.map(normalizeInnings);
  return scoreboardInnings(detail);
}

export function extractToss(nodes: readonly RawNode[]): Toss | Record<string, never> {
  const winner = resolveStringFrom(nodes, TOSS_PATHS.winner);
  const rawDecision = resolveStringFrom(nodes, TOSS_PATHS.decision);
  if (!winner || !rawDecision) return {};
  return { winner, decision: TOSS_CHOICES[rawDecision] ?? rawDecision };
}

function awardWinner(node: RawNode): string {
  const award = resolveList(node, PLAYER_OF_MATCH_PATHS.awards).find((entry) =>
    PLAYER_OF_MATCH_AWARD_TYPES.includes(resolveString(entry, PLAYER_OF_MATCH_PATHS.awardType))
  );
  return award ? resolveString(award, PLAYER_OF_MATCH_PATHS.awardPlayer) : "";
}

export function extractPlayerOfMatch(nodes: readonly RawNode[]): string {
  return (
    resolveStringFrom(nodes, PLAYER_OF_MATCH_PATHS.direct) ||
    resolveStringFrom(nodes, PLAYER_OF_MATCH_PATHS.alternate) ||
    nodes.map(awardWinner).find(Boolean) ||
    ""
  );
}

function detailMatchNode(detail: RawNode): RawNode {
  return resolveRecord(detail, DETAIL_MATCH_WRAPPERS) ?? detail;
}

/**
 * Builds the canonical record for one match from its listing entry and, when
 * available, its scorecard payload. Only a listing entry without an
 * identifier is an error; the detail's own id is never used.
 */
export function normalizeMatch(rawSummary: RawNode, rawDetail?: RawNode | null): NormalizeResult {
  const hasDetail = isRecord(rawDetail);
  const detailMatch = hasDetail ? detailMatchNode(rawDetail) : null;
  const matchNodes = detailMatch && detailMatch !== rawDetail ? [detailMatch, rawDetail] : [rawDetail];
  const nodes: RawNode[] = hasDetail ? [...matchNodes, rawSummary] : [rawSummary];

  const summary = readSummary(...nodes);
  const matchId = resolveString(rawSummary, MATCH_PATHS.id);
  if (!matchId) {
    return { ok: false, error: missingIdentifier(summary.title) };
  }

  const teams: TeamRef[] = readTeams(nodes);
  const city = resolveStringFrom(nodes, MATCH_PATHS.city);
  const record: CanonicalMatchRecord = {
    match_id: matchId,
    title: summary.title,
    series: summary.series,
    venue: resolveStringFrom(nodes, MATCH_PATHS.venue),
    ...(city ? { city } : {}),
    start_date: summary.startDate,
    status: summary.status,
    is_completed: summary.isCompleted,
    toss: hasDetail ? extractToss(matchNodes) : {},
    teams,
    innings: hasDetail ? extractInnings(rawDetail) : [],
    player_of_match: hasDetail ? extractPlayerOfMatch(matchNodes) : "",
  };

  return { ok: true, record: deepFreeze(record) };
}
