import fs from "node:fs";
import path from "node:path";

import { localDateString, localTimeString } from "../../lib/cricket/dates";
import type { CanonicalMatchRecord, DailySummary } from "../../lib/cricket/types";
import { ensureDir } from "./config";
import type { RunContext } from "./types";

export const LEDGER_FILENAME = "processed.json";

export function appendRunLog(ctx: RunContext, message: string) {
  const line = `[${new Date().toISOString()}] ${message}`;
  ctx.logLines.push(line);
  console.log(line);
}

function writeJson(filePath: string, payload: unknown) {
  fs.writeFileSync(filePath, JSON.stringify(payload, null, 2), "utf8");
}

function safeId(matchId: string) {
  return matchId.replace(/[^A-Za-z0-9_-]+/g, "_");
}

export function matchFilename(matchId: string, dayStamp: string) {
  return `match_${safeId(matchId)}_${dayStamp}.json`;
}

export function dailySummaryFilename(dayStamp: string) {
  return `daily_matches_${dayStamp}.json`;
}

/**
 * Writes one match document. An existing file for the same match and day is
 * left untouched; returns null in that case.
 */
export function writeMatchRecord(ctx: RunContext, record: CanonicalMatchRecord): string | null {
  ensureDir(ctx.dataDir);
  const filePath = path.join(ctx.dataDir, matchFilename(record.match_id, ctx.dayStamp));
  if (fs.existsSync(filePath)) {
    appendRunLog(ctx, `Skipping ${path.basename(filePath)}: already written`);
    return null;
  }
  writeJson(filePath, record);
  appendRunLog(ctx, `Saved ${path.basename(filePath)}`);
  return filePath;
}

export function buildDailySummary(ctx: RunContext, records: CanonicalMatchRecord[]): DailySummary {
  return {
    date: localDateString(ctx.startedAt),
    run_time: `${localDateString(ctx.startedAt)} ${localTimeString(ctx.startedAt)}`,
    total_matches: records.length,
    matches: records,
  };
}

export function writeDailySummary(ctx: RunContext, records: CanonicalMatchRecord[]): string {
  ensureDir(ctx.dataDir);
  const filePath = path.join(ctx.dataDir, dailySummaryFilename(ctx.dayStamp));
  writeJson(filePath, buildDailySummary(ctx, records));
  appendRunLog(ctx, `Daily summary saved: ${path.basename(filePath)} (${records.length} matches)`);
  return filePath;
}

export function writeRunLog(ctx: RunContext): string {
  ensureDir(ctx.dataDir);
  const filePath = path.join(ctx.dataDir, `run_${ctx.runId}.log`);
  fs.writeFileSync(filePath, ctx.logLines.join("\n"), "utf8");
  return filePath;
}

/** Match ids handled by earlier runs. */
export function loadProcessedLedger(dataDir: string): Set<string> {
  const filePath = path.join(dataDir, LEDGER_FILENAME);
  if (!fs.existsSync(filePath)) return new Set<string>();
  const parsed: unknown = JSON.parse(fs.readFileSync(filePath, "utf8"));
  if (!Array.isArray(parsed)) {
    throw new Error(`Ledger at ${filePath} must be an array of match ids`);
  }
  return new Set(parsed.filter((id): id is string => typeof id === "string"));
}

export function saveProcessedLedger(ctx: RunContext, matchIds: Iterable<string>): Set<string> {
  const merged = loadProcessedLedger(ctx.dataDir);
  for (const id of matchIds) {
    merged.add(id);
  }
  ensureDir(ctx.dataDir);
  writeJson(path.join(ctx.dataDir, LEDGER_FILENAME), Array.from(merged));
  return merged;
}
