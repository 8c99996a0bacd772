#!/usr/bin/env node
import "dotenv/config";
import process from "node:process";

import { normalizeBatch } from "../../lib/cricket/batch";
import { formatMatchSummary } from "../../lib/cricket/display";
import { errorMessage } from "../../lib/cricket/errors";
import {
  DEFAULT_TOURNAMENT_MARKERS,
  DEFAULT_WARM_UP_MARKERS,
  explainSelections,
  matchesDate,
  type SelectionCriteria,
} from "../../lib/cricket/select";
import { readSummary } from "../../lib/cricket/summary";
import type { CanonicalMatchRecord, RawNode } from "../../lib/cricket/types";
import { USAGE, parseArgs } from "./args";
import { createRunContext, loadConfig, requireCredentials, resolveSourceName } from "./config";
import { getSource } from "./sources";
import {
  appendRunLog,
  loadProcessedLedger,
  saveProcessedLedger,
  writeDailySummary,
  writeMatchRecord,
  writeRunLog,
} from "./storage";
import type { CliOptions, MatchSource, RunContext } from "./types";

function buildCriteria(options: CliOptions, processed: ReadonlySet<string>, source: MatchSource): SelectionCriteria {
  return {
    ...(options.allTournaments ? {} : { tournament: { markers: DEFAULT_TOURNAMENT_MARKERS } }),
    excludeWarmUp: { markers: DEFAULT_WARM_UP_MARKERS },
    completedOnly: !options.includeLive,
    ...(options.match ? { namedFixture: options.match } : {}),
    // undated listings are filtered after the detail fetch
    ...(options.date && source.listingHasDates ? { date: options.date } : {}),
    processed,
  };
}

function selectFromListing(ctx: RunContext, matches: RawNode[], criteria: SelectionCriteria) {
  const selected: RawNode[] = [];
  for (const { match, id, reason } of explainSelections(matches, criteria)) {
    const { title } = readSummary(match);
    if (reason) {
      appendRunLog(ctx, `Skipping ${id || "?"} ${title}: ${reason}`);
    } else {
      appendRunLog(ctx, `Selected ${id} ${title}`);
      selected.push(match);
    }
  }
  return selected;
}

async function collect(ctx: RunContext, source: MatchSource, options: CliOptions) {
  const processed = loadProcessedLedger(ctx.dataDir);

  let listing: RawNode[];
  try {
    listing = await source.fetchMatchList(ctx);
  } catch (error) {
    appendRunLog(ctx, `Failed to fetch match list from ${source.name}: ${errorMessage(error)}`);
    process.exitCode = 1;
    return;
  }
  appendRunLog(ctx, `Listing returned ${listing.length} match(es)`);

  const selected = selectFromListing(ctx, listing, buildCriteria(options, processed, source));
  if (ctx.dryRun) {
    appendRunLog(ctx, `Dry-run: ${selected.length} match(es) would be collected`);
    return;
  }

  const outcomes = await normalizeBatch(selected, (stub) => source.fetchMatchDetail(stub, ctx), {
    concurrency: ctx.config.concurrency,
  });

  const records: CanonicalMatchRecord[] = [];
  let failed = 0;
  for (const outcome of outcomes) {
    if (outcome.status === "failed") {
      failed += 1;
      appendRunLog(ctx, `Failed ${outcome.match_id || "?"} [${outcome.error.code}]: ${outcome.error.message}`);
      continue;
    }
    const { record } = outcome;
    if (options.date && !source.listingHasDates && !matchesDate(record.start_date, options.date)) {
      appendRunLog(ctx, `Skipping ${record.match_id} ${record.title}: date`);
      continue;
    }
    records.push(record);
  }

  appendRunLog(ctx, `Normalized ${records.length} match(es), ${failed} failed`);

  for (const record of records) {
    formatMatchSummary(record).forEach((line) => appendRunLog(ctx, line));
    writeMatchRecord(ctx, record);
  }

  if (records.length) {
    writeDailySummary(ctx, records);
  } else {
    appendRunLog(ctx, "No matches collected");
  }
  saveProcessedLedger(
    ctx,
    records.map((record) => record.match_id)
  );
}

async function main() {
  const options = parseArgs(process.argv.slice(2));
  if (options.help) {
    console.log(USAGE);
    return;
  }

  const config = loadConfig();
  const sourceName = resolveSourceName(options.source);
  requireCredentials(config, sourceName);
  const source = getSource(sourceName);
  const ctx = createRunContext({ dryRun: options.dryRun, config });

  appendRunLog(ctx, `Starting cricket results run ${ctx.runId} via ${source.name} (${ctx.dryRun ? "dry-run" : "full"})`);
  try {
    await collect(ctx, source, options);
    appendRunLog(ctx, `Run ${ctx.runId} complete`);
  } finally {
    writeRunLog(ctx);
  }
}

main().catch((error) => {
  console.error(errorMessage(error));
  process.exitCode = 1;
});
