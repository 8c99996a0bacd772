import { isRecord, resolveString } from "../../../lib/cricket/resolve";
import { MATCH_PATHS } from "../../../lib/cricket/fieldPaths";
import type { RawNode } from "../../../lib/cricket/types";
import { fetchJson } from "../http";
import { appendRunLog } from "../storage";
import type { MatchSource, RunContext } from "../types";

type Envelope = { ok: true; data: unknown } | { ok: false; reason: string };

/** CricketData wraps every payload as `{ status: "success", data }`. */
export function unwrapEnvelope(payload: unknown): Envelope {
  const status = resolveString(payload, ["status"]);
  if (status !== "success") {
    return { ok: false, reason: resolveString(payload, ["reason"], status || "Unknown error") };
  }
  return { ok: true, data: isRecord(payload) ? payload.data : undefined };
}

function endpoint(ctx: RunContext, route: string, params: Record<string, string>) {
  const { baseUrl, apiKey } = ctx.config.cricketdata;
  const url = new URL(`${baseUrl.replace(/\/$/, "")}/${route}`);
  url.searchParams.set("apikey", apiKey ?? "");
  for (const [key, value] of Object.entries(params)) {
    url.searchParams.set(key, value);
  }
  return url.toString();
}

const cricketData: MatchSource = {
  name: "cricketdata",
  listingHasDates: true,

  async fetchMatchList(ctx) {
    const payload = await fetchJson(endpoint(ctx, "matches", { offset: "0" }), ctx);
    const envelope = unwrapEnvelope(payload);
    if (!envelope.ok) {
      appendRunLog(ctx, `CricketData error: ${envelope.reason}`);
      return [];
    }
    return Array.isArray(envelope.data) ? envelope.data : [];
  },

  async fetchMatchDetail(stub: RawNode, ctx) {
    const id = resolveString(stub, MATCH_PATHS.id);
    const payload = await fetchJson(endpoint(ctx, "match_scorecard", { id }), ctx);
    const envelope = unwrapEnvelope(payload);
    if (!envelope.ok) {
      appendRunLog(ctx, `CricketData scorecard error for ${id}: ${envelope.reason}`);
      return null;
    }
    return envelope.data ?? null;
  },
};

export default cricketData;
