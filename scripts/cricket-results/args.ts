import { localDateString } from "../../lib/cricket/dates";
import { SOURCE_NAMES, isSourceName } from "./config";
import type { CliOptions } from "./types";

export const USAGE = [
  "Usage: npm run collect [-- options]",
  "",
  `--source <name>      One of ${SOURCE_NAMES.join(", ")} (default: CRICKET_SOURCE or cricketdata)`,
  "--date <YYYY-MM-DD>  Only matches starting on this date; \"today\" for the local date",
  "--match <text>       Only fixtures whose title contains this text",
  "--all-tournaments    Do not restrict to the configured tournament",
  "--include-live       Keep matches that have not finished",
  "--dry-run            List the selected matches, no detail fetches or writes",
  "--help               Show this message",
].join("\n");

const VALUE_FLAGS = new Set(["--source", "--date", "--match"]);

export function parseArgs(argv: readonly string[], now: Date = new Date()): CliOptions {
  const options: CliOptions = {
    source: null,
    date: null,
    match: null,
    allTournaments: false,
    includeLive: false,
    dryRun: false,
    help: false,
  };

  for (let index = 0; index < argv.length; index += 1) {
    const arg = argv[index];
    const [flag, inline] = arg.startsWith("--") && arg.includes("=") ? splitOnce(arg) : [arg, undefined];

    if (VALUE_FLAGS.has(flag)) {
      let value = inline;
      if (value === undefined) {
        value = argv[index + 1];
        index += 1;
      }
      if (value === undefined || value.startsWith("--")) {
        throw new Error(`Missing value for ${flag}`);
      }
      if (flag === "--source") {
        const name = value.trim().toLowerCase();
        if (!isSourceName(name)) {
          throw new Error(`Unknown source "${value}" (expected one of ${SOURCE_NAMES.join(", ")})`);
        }
        options.source = name;
      } else if (flag === "--date") {
        options.date = value === "today" ? localDateString(now) : value;
      } else {
        options.match = value;
      }
      continue;
    }

    if (inline !== undefined) {
      throw new Error(`Unknown argument: ${arg}`);
    }

    switch (flag) {
      case "--all-tournaments":
        options.allTournaments = true;
        break;
      case "--include-live":
        options.includeLive = true;
        break;
      case "--dry-run":
        options.dryRun = true;
        break;
      case "--help":
        options.help = true;
        break;
      default:
        throw new Error(`Unknown argument: ${arg}`);
    }
  }

  return options;
}

function splitOnce(arg: string): [string, string] {
  const at = arg.indexOf("=");
  return [arg.slice(0, at), arg.slice(at + 1)];
}
