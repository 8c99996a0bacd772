import type { SourceName } from "../../../lib/cricket/types";
import type { MatchSource } from "../types";
import cricketData from "./cricketdata";
import espnCricinfo from "./espncricinfo";
import espnHtml from "./espnHtml";
import sportmonks from "./sportmonks";

const SOURCES: Record<SourceName, MatchSource> = {
  cricketdata: cricketData,
  espncricinfo: espnCricinfo,
  "espn-html": espnHtml,
  sportmonks,
};

export function getSource(name: SourceName): MatchSource {
  return SOURCES[name];
}
