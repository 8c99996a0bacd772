import { MATCH_PATHS, TEAM_PATHS } from "./fieldPaths";
import { isRecord, resolveBoolean, resolveList, resolveRecord, resolveString, resolveStringFrom } from "./resolve";
import { isCompleted } from "./status";
import type { RawNode, TeamRef } from "./types";

export interface MatchSummaryFields {
  id: string;
  title: string;
  series: string;
  status: string;
  ended: boolean;
  startDate: string;
  isCompleted: boolean;
}

function cleanTeamEntry(entry: unknown, info: unknown[]): TeamRef | null {
  if (typeof entry === "string") {
    const name = entry.trim();
    if (!name) return null;
    const match = info.find((item) => resolveString(item, TEAM_PATHS.name) === name);
    return { name, short_name: match ? resolveString(match, TEAM_PATHS.shortName) : "" };
  }
  const name = resolveString(entry, TEAM_PATHS.name);
  if (!name) return null;
  return { name, short_name: resolveString(entry, TEAM_PATHS.shortName) };
}

/** Teams in source order, from the first node that lists any. */
export function readTeams(nodes: readonly RawNode[]): TeamRef[] {
  for (const node of nodes) {
    const info = resolveList(node, TEAM_PATHS.info);
    const listed = resolveList(node, TEAM_PATHS.list)
      .map((entry) => cleanTeamEntry(entry, info))
      .filter((team): team is TeamRef => team !== null);
    if (listed.length) return listed;

    const sides = TEAM_PATHS.sides
      .map((path) => resolveRecord(node, [path]))
      .map((side) => (side ? cleanTeamEntry(side, []) : null))
      .filter((team): team is TeamRef => team !== null);
    if (sides.length) return sides;
  }
  return [];
}

export function readTitle(nodes: readonly RawNode[]): string {
  const title = resolveStringFrom(nodes, MATCH_PATHS.title);
  if (title) return title;
  const teams = readTeams(nodes);
  return teams.length >= 2 ? `${teams[0].name} vs ${teams[1].name}` : "";
}

/**
 * Match-level fields of a raw listing entry. Later nodes are fallbacks for
 * fields the earlier ones lack.
 */
export function readSummary(...nodes: RawNode[]): MatchSummaryFields {
  const present = nodes.filter((node) => isRecord(node));
  const status = resolveStringFrom(present, MATCH_PATHS.status);
  const ended = present.some((node) => resolveBoolean(node, MATCH_PATHS.ended));
  return {
    id: resolveStringFrom(present, MATCH_PATHS.id),
    title: readTitle(present),
    series: resolveStringFrom(present, MATCH_PATHS.series),
    status,
    ended,
    startDate: resolveStringFrom(present, MATCH_PATHS.startDate),
    isCompleted: isCompleted(status, ended),
  };
}
