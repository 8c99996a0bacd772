import { afterEach, before, after, describe, it } from "node:test";
import assert from "node:assert";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import { createRunContext, loadConfig } from "../config";
import { SourceError, fetchJson, fetchText, redactUrl } from "../http";
import { getSource } from "../sources";
import { unwrapEnvelope } from "../sources/cricketdata";
import { scheduleMatches } from "../sources/espncricinfo";
import { resultsPageUrl } from "../sources/espnHtml";
import type { RunContext } from "../types";

const realFetch = globalThis.fetch;
let requested: string[] = [];
let dataDir = "";

function stubFetch(respond: (url: string, call: number) => Response) {
  requested = [];
  const stub: typeof fetch = async (input) => {
    const url = input instanceof Request ? input.url : String(input);
    requested.push(url);
    return respond(url, requested.length);
  };
  globalThis.fetch = stub;
}

function makeContext(): RunContext {
  return createRunContext({
    dryRun: false,
    config: loadConfig({
      CRICKET_DATA_DIR: dataDir,
      CRICKETDATA_API_KEY: "test-secret",
      SPORTMONKS_API_TOKEN: "test-token",
    }),
    now: new Date(2026, 1, 15, 9, 30, 5),
  });
}

before(() => {
  dataDir = fs.mkdtempSync(path.join(os.tmpdir(), "cricket-sources-"));
});

after(() => {
  fs.rmSync(dataDir, { recursive: true, force: true });
});

afterEach(() => {
  globalThis.fetch = realFetch;
});

describe("http", () => {
  it("masks credentials in logged URLs", () => {
    assert.strictEqual(
      redactUrl("https://api.cricapi.com/v1/matches?apikey=test-secret&offset=0"),
      "https://api.cricapi.com/v1/matches?apikey=***&offset=0"
    );
    assert.strictEqual(redactUrl("not a url"), "not a url");
  });

  it("retries failed responses", async () => {
    stubFetch((_, call) => (call < 3 ? new Response("busy", { status: 503 }) : new Response("ok")));
    const ctx = makeContext();
    assert.strictEqual(await fetchText("https://example.com/a", ctx, { retryDelayMs: 0 }), "ok");
    assert.strictEqual(requested.length, 3);
  });

  it("gives up after three attempts with the last HTTP error", async () => {
    stubFetch(() => new Response("down", { status: 500 }));
    const ctx = makeContext();
    await assert.rejects(fetchText("https://example.com/a", ctx, { retryDelayMs: 0 }), (error: unknown) => {
      assert.ok(error instanceof SourceError);
      assert.strictEqual(error.code, "http_error_500");
      return true;
    });
    assert.strictEqual(requested.length, 3);
  });

  it("flags a body that is not JSON", async () => {
    stubFetch(() => new Response("<html></html>"));
    const ctx = makeContext();
    await assert.rejects(fetchJson("https://example.com/a", ctx, { retryDelayMs: 0 }), (error: unknown) => {
      assert.ok(error instanceof SourceError);
      assert.strictEqual(error.code, "bad_envelope");
      return true;
    });
  });
});

describe("cricketdata", () => {
  it("unwraps the status envelope", () => {
    assert.deepStrictEqual(unwrapEnvelope({ status: "success", data: [{ id: "m-1" }] }), {
      ok: true,
      data: [{ id: "m-1" }],
    });
    assert.deepStrictEqual(unwrapEnvelope({ status: "failure", reason: "Invalid API Key" }), {
      ok: false,
      reason: "Invalid API Key",
    });
    assert.deepStrictEqual(unwrapEnvelope(null), { ok: false, reason: "Unknown error" });
  });

  it("lists current matches without leaking the key to the log", async () => {
    stubFetch(() => Response.json({ status: "success", data: [{ id: "m-1" }, { id: "m-2" }] }));
    const ctx = makeContext();
    const matches = await getSource("cricketdata").fetchMatchList(ctx);
    assert.deepStrictEqual(matches, [{ id: "m-1" }, { id: "m-2" }]);
    assert.deepStrictEqual(requested, ["https://api.cricapi.com/v1/matches?apikey=test-secret&offset=0"]);
    assert.ok(ctx.logLines[0].endsWith("] Fetching https://api.cricapi.com/v1/matches?apikey=***&offset=0 (attempt 1)"));
    assert.strictEqual(
      ctx.logLines.some((line) => line.includes("test-secret")),
      false
    );
  });

  it("returns no detail when the scorecard call is refused", async () => {
    stubFetch(() => Response.json({ status: "failure", reason: "Blocking since hits today exceeded" }));
    const ctx = makeContext();
    assert.strictEqual(await getSource("cricketdata").fetchMatchDetail({ id: "m-1" }, ctx), null);
    assert.deepStrictEqual(requested, ["https://api.cricapi.com/v1/match_scorecard?apikey=test-secret&id=m-1"]);
  });
});

describe("espncricinfo", () => {
  it("reads schedule matches from the page content", () => {
    assert.deepStrictEqual(scheduleMatches({ content: { matches: [{ objectId: 1 }] } }), [{ objectId: 1 }]);
    assert.deepStrictEqual(scheduleMatches({ content: {} }), []);
  });

  it("requests the match page for the stub's series", async () => {
    stubFetch(() => Response.json({ match: { objectId: 1512745 } }));
    const ctx = makeContext();
    const detail = await getSource("espncricinfo").fetchMatchDetail({ objectId: 1512745 }, ctx);
    assert.deepStrictEqual(detail, { match: { objectId: 1512745 } });
    assert.deepStrictEqual(requested, [
      "https://hs-consumer-api.espncricinfo.com/v1/pages/match/home?lang=en&seriesId=1502138&matchId=1512745",
    ]);
  });
});

describe("espn-html", () => {
  it("lists scorecard links from the series results page", async () => {
    const html = `<a href="/series/icc-men-s-t20-world-cup-2025-26-1502138/nepal-vs-italy-9th-match-group-c-1512727/full-scorecard">Scorecard</a>`;
    stubFetch(() => new Response(html, { headers: { "Content-Type": "text/html" } }));
    const ctx = makeContext();
    const source = getSource("espn-html");
    const stubs = await source.fetchMatchList(ctx);

    assert.strictEqual(source.listingHasDates, false);
    assert.deepStrictEqual(requested, [resultsPageUrl(ctx)]);
    assert.strictEqual(
      resultsPageUrl(ctx),
      "https://www.espncricinfo.com/series/icc-men-s-t20-world-cup-2025-26-1502138/match-results"
    );
    assert.deepStrictEqual(stubs, [
      {
        objectId: "1512727",
        title: "Nepal vs Italy 9th Match Group C",
        url: "https://www.espncricinfo.com/series/icc-men-s-t20-world-cup-2025-26-1502138/nepal-vs-italy-9th-match-group-c-1512727/full-scorecard",
        series: "ICC Men's T20 World Cup 2025-26",
      },
    ]);
  });

  it("skips the detail fetch for a stub without a URL", async () => {
    stubFetch(() => new Response(""));
    const ctx = makeContext();
    assert.strictEqual(await getSource("espn-html").fetchMatchDetail({ objectId: "1" }, ctx), null);
    assert.strictEqual(requested.length, 0);
  });
});

describe("sportmonks", () => {
  it("fetches a fixture with its scorecard includes", async () => {
    stubFetch(() => Response.json({ data: { id: 52001, note: "India won by 6 wickets" } }));
    const ctx = makeContext();
    const detail = await getSource("sportmonks").fetchMatchDetail({ id: 52001 }, ctx);

    assert.deepStrictEqual(detail, { id: 52001, note: "India won by 6 wickets" });
    const url = new URL(requested[0]);
    assert.strictEqual(url.pathname, "/api/v2.0/fixtures/52001");
    assert.strictEqual(url.searchParams.get("api_token"), "test-token");
    assert.strictEqual(
      url.searchParams.get("include"),
      "runs,batting.batsman,bowling.bowler,scoreboards,venue,league,localteam,visitorteam,manofmatch"
    );
  });

  it("lists fixtures from the data array", async () => {
    stubFetch(() => Response.json({ data: [{ id: 1 }, { id: 2 }] }));
    const ctx = makeContext();
    assert.deepStrictEqual(await getSource("sportmonks").fetchMatchList(ctx), [{ id: 1 }, { id: 2 }]);
  });
});
