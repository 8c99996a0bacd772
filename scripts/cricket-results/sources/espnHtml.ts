import { extractScorecardLinks, parseScorecardHtml } from "../../../lib/parsers/espnScorecard";
import { resolveString } from "../../../lib/cricket/resolve";
import { fetchHtml } from "../http";
import { appendRunLog } from "../storage";
import type { MatchSource, RunContext } from "../types";

export function resultsPageUrl(ctx: RunContext) {
  const { slug, id } = ctx.config.series;
  return `${ctx.config.espncricinfo.siteUrl.replace(/\/$/, "")}/series/${slug}-${id}/match-results`;
}

const espnHtml: MatchSource = {
  name: "espn-html",
  listingHasDates: false,

  async fetchMatchList(ctx) {
    const url = resultsPageUrl(ctx);
    const html = await fetchHtml(url, ctx);
    const links = extractScorecardLinks(html, url, ctx.config.series.slug);
    appendRunLog(ctx, `Found ${links.length} scorecard link(s) on ${url}`);
    return links.map((link) => ({ ...link, series: ctx.config.series.name }));
  },

  async fetchMatchDetail(stub, ctx) {
    const url = resolveString(stub, ["url"]);
    if (!url) return null;
    const html = await fetchHtml(url, ctx);
    return parseScorecardHtml(html, url);
  },
};

export default espnHtml;
