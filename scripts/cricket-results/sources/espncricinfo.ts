import { MATCH_PATHS } from "../../../lib/cricket/fieldPaths";
import { resolveList, resolveString } from "../../../lib/cricket/resolve";
import { fetchJson } from "../http";
import type { MatchSource, RunContext } from "../types";

const SCHEDULE_PATHS = ["content.matches", "matches", "content.matchEvents"];

function pageUrl(ctx: RunContext, page: string, params: Record<string, string>) {
  const url = new URL(`${ctx.config.espncricinfo.baseUrl.replace(/\/$/, "")}/${page}`);
  url.searchParams.set("lang", "en");
  for (const [key, value] of Object.entries(params)) {
    url.searchParams.set(key, value);
  }
  return url.toString();
}

export function scheduleMatches(payload: unknown): unknown[] {
  return resolveList(payload, SCHEDULE_PATHS);
}

const espnCricinfo: MatchSource = {
  name: "espncricinfo",
  listingHasDates: true,

  async fetchMatchList(ctx) {
    const payload = await fetchJson(pageUrl(ctx, "series/schedule", { seriesId: ctx.config.series.id }), ctx);
    return scheduleMatches(payload);
  },

  async fetchMatchDetail(stub, ctx) {
    const matchId = resolveString(stub, MATCH_PATHS.id);
    const seriesId = resolveString(stub, ["series.objectId", "seriesId"], ctx.config.series.id);
    return fetchJson(pageUrl(ctx, "match/home", { seriesId, matchId }), ctx);
  },
};

export default espnCricinfo;
