import fs from "node:fs";
import path from "node:path";

import { localDateString, localTimeString } from "../../lib/cricket/dates";
import type { SourceName } from "../../lib/cricket/types";
import type { CollectorConfig, RunContext } from "./types";

export const SOURCE_NAMES: readonly SourceName[] = ["cricketdata", "espncricinfo", "espn-html", "sportmonks"];

export const DEFAULT_DATA_DIR = path.join(process.cwd(), "data", "cricket");

const DEFAULT_SERIES = {
  id: "1502138",
  slug: "icc-men-s-t20-world-cup-2025-26",
  name: "ICC Men's T20 World Cup 2025-26",
};

export function ensureDir(dirPath: string) {
  if (!fs.existsSync(dirPath)) {
    fs.mkdirSync(dirPath, { recursive: true });
  }
}

export function isSourceName(value: string): value is SourceName {
  return SOURCE_NAMES.some((name) => name === value);
}

function positiveInt(value: string | undefined, fallback: number) {
  const parsed = Number(value);
  return Number.isInteger(parsed) && parsed > 0 ? parsed : fallback;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): CollectorConfig {
  return {
    dataDir: env.CRICKET_DATA_DIR || DEFAULT_DATA_DIR,
    concurrency: positiveInt(env.CRICKET_CONCURRENCY, 4),
    series: {
      id: env.CRICKET_SERIES_ID || DEFAULT_SERIES.id,
      slug: env.CRICKET_SERIES_SLUG || DEFAULT_SERIES.slug,
      name: env.CRICKET_SERIES_NAME || DEFAULT_SERIES.name,
    },
    cricketdata: {
      baseUrl: env.CRICKETDATA_BASE_URL || "https://api.cricapi.com/v1",
      apiKey: env.CRICKETDATA_API_KEY || null,
    },
    espncricinfo: {
      baseUrl: env.ESPNCRICINFO_BASE_URL || "https://hs-consumer-api.espncricinfo.com/v1/pages",
      siteUrl: env.ESPNCRICINFO_SITE_URL || "https://www.espncricinfo.com",
    },
    sportmonks: {
      baseUrl: env.SPORTMONKS_BASE_URL || "https://cricket.sportmonks.com/api/v2.0",
      apiToken: env.SPORTMONKS_API_TOKEN || null,
    },
  };
}

/** Source chosen on the command line, else `CRICKET_SOURCE`, else CricketData. */
export function resolveSourceName(cliSource: SourceName | null, env: NodeJS.ProcessEnv = process.env): SourceName {
  if (cliSource) return cliSource;
  const fromEnv = (env.CRICKET_SOURCE ?? "").trim().toLowerCase();
  if (!fromEnv) return "cricketdata";
  if (!isSourceName(fromEnv)) {
    throw new Error(`Unknown CRICKET_SOURCE "${fromEnv}" (expected one of ${SOURCE_NAMES.join(", ")})`);
  }
  return fromEnv;
}

export function requireCredentials(config: CollectorConfig, source: SourceName) {
  if (source === "cricketdata" && !config.cricketdata.apiKey) {
    throw new Error("CRICKETDATA_API_KEY is not set");
  }
  if (source === "sportmonks" && !config.sportmonks.apiToken) {
    throw new Error("SPORTMONKS_API_TOKEN is not set");
  }
}

export function createRunContext({
  dryRun,
  config,
  now = new Date(),
}: {
  dryRun: boolean;
  config: CollectorConfig;
  now?: Date;
}): RunContext {
  ensureDir(config.dataDir);
  const dayStamp = localDateString(now).replace(/-/g, "");
  const runId = `${dayStamp}_${localTimeString(now).replace(/:/g, "")}`;
  return {
    dryRun,
    runId,
    dataDir: config.dataDir,
    startedAt: now,
    dayStamp,
    logLines: [],
    config,
  };
}
