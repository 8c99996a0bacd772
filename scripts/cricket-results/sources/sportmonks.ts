import { MATCH_PATHS } from "../../../lib/cricket/fieldPaths";
import { resolveList, resolveRecord, resolveString } from "../../../lib/cricket/resolve";
import { fetchJson } from "../http";
import type { MatchSource, RunContext } from "../types";

const LIST_INCLUDES = "league,localteam,visitorteam";
const DETAIL_INCLUDES = "runs,batting.batsman,bowling.bowler,scoreboards,venue,league,localteam,visitorteam,manofmatch";

function resourceUrl(ctx: RunContext, resource: string, include: string) {
  const { baseUrl, apiToken } = ctx.config.sportmonks;
  const url = new URL(`${baseUrl.replace(/\/$/, "")}/${resource}`);
  url.searchParams.set("api_token", apiToken ?? "");
  url.searchParams.set("include", include);
  return url.toString();
}

const sportmonks: MatchSource = {
  name: "sportmonks",
  listingHasDates: true,

  async fetchMatchList(ctx) {
    const payload = await fetchJson(resourceUrl(ctx, "fixtures", LIST_INCLUDES), ctx);
    return resolveList(payload, ["data"]);
  },

  async fetchMatchDetail(stub, ctx) {
    const id = resolveString(stub, MATCH_PATHS.id);
    const payload = await fetchJson(resourceUrl(ctx, `fixtures/${encodeURIComponent(id)}`, DETAIL_INCLUDES), ctx);
    return resolveRecord(payload, ["data"]);
  },
};

export default sportmonks;
