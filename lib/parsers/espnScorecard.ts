import * as cheerio from "cheerio";

const SITE_URL = "https://www.espncricinfo.com";

const RESULT_PATTERN = /\b(won by|won the match|tied|no result|abandoned|match drawn)\b/i;
const DATE_PATTERN =
  /\b(?:\d{1,2}\s+(?:Jan|Feb|Mar|Apr|May|Jun|Jul|Aug|Sep|Oct|Nov|Dec)[a-z]*\.?,?\s+\d{4}|(?:Jan|Feb|Mar|Apr|May|Jun|Jul|Aug|Sep|Oct|Nov|Dec)[a-z]*\.?\s+\d{1,2},?\s+\d{4})\b/;
// "India 175/7 (20 ov, T:176)" or "Pakistan 120 (18.3 ov)"
const INNINGS_HEADING = /^(.+?)\s+(\d{1,3})(?:\/(\d{1,2}))?\s*\((\d{1,3}(?:\.\d)?)\s*ov/i;
const SCORECARD_LINK = /\/series\/([^/]+)\/([^/]+)-(\d+)\/full-scorecard/;

export type ScorecardRow = Record<string, string>;

export type ScrapedInnings = {
  team: string;
  heading: string;
  runs: number;
  wickets: number;
  overs: number;
  extras?: number;
  batsmen: ScorecardRow[];
  bowlers: ScorecardRow[];
};

export type ScrapedScorecard = {
  match: {
    objectId: string | null;
    title: string | null;
    statusText: string | null;
    ground: { name: string } | null;
    startDate: string | null;
    url: string;
    innings: ScrapedInnings[];
    playerOfMatch: string | null;
  };
};

export type ScorecardLink = {
  objectId: string;
  title: string;
  url: string;
};

function cleanText(value?: string | null) {
  return value ? value.replace(/\s+/g, " ").trim() : "";
}

function cleanPlayerName(value: string) {
  return cleanText(value.replace(/[†]/g, ""));
}

function humanizeSlug(slug: string) {
  return slug
    .split("-")
    .filter(Boolean)
    .map((word) => (word === "vs" ? word : word.charAt(0).toUpperCase() + word.slice(1)))
    .join(" ");
}

function absoluteUrl(url: string, base: string) {
  try {
    return new URL(url, base).toString();
  } catch {
    return null;
  }
}

export function matchIdFromUrl(url: string): string | null {
  const match = url.match(SCORECARD_LINK);
  return match ? match[3] : null;
}

/**
 * Full-scorecard links on a series results page, in page order, without
 * duplicates. When `seriesSlug` is given only that series' links are kept.
 */
export function extractScorecardLinks(html: string, pageUrl: string, seriesSlug?: string): ScorecardLink[] {
  const $ = cheerio.load(html);
  const seen = new Set<string>();
  const links: ScorecardLink[] = [];

  $("a[href]").each((_, element) => {
    const href = $(element).attr("href");
    if (!href) return;
    const absolute = absoluteUrl(href, pageUrl || SITE_URL);
    if (!absolute) return;
    const url = absolute.split("#")[0].split("?")[0];
    const match = url.match(SCORECARD_LINK);
    if (!match) return;
    if (seriesSlug && !match[1].includes(seriesSlug)) return;
    if (seen.has(url)) return;
    seen.add(url);
    links.push({ objectId: match[3], title: humanizeSlug(match[2]), url });
  });

  return links;
}

function classifyTable(headers: string[]): "batting" | "bowling" | null {
  const upper = headers.map((header) => header.toUpperCase());
  if (upper.includes("O") && upper.includes("W")) return "bowling";
  if (upper.includes("R") && upper.includes("B")) return "batting";
  return null;
}

function toRows(cellRows: string[][], headers: string[], nameKey: string): ScorecardRow[] {
  return cellRows
    .filter((cells) => cells.length > 0)
    .map((cells) => {
      const row: ScorecardRow = {};
      cells.forEach((value, index) => {
        const header = headers[index] ?? "";
        if (index === 0) {
          row[nameKey] = cleanPlayerName(value);
        } else if (!header) {
          row.dismissal = value;
        } else {
          row[header] = value;
        }
      });
      return row;
    });
}

function extrasFrom(rows: ScorecardRow[]): number | undefined {
  const extrasRow = rows.find((row) => /^extras/i.test(row.batsman ?? ""));
  if (!extrasRow) return undefined;
  const numeric = Object.entries(extrasRow)
    .filter(([key]) => key !== "batsman")
    .map(([, value]) => value)
    .find((value) => /^\d+$/.test(value));
  return numeric === undefined ? undefined : Number(numeric);
}

function parseHeading(text: string): ScrapedInnings | null {
  const match = text.match(INNINGS_HEADING);
  if (!match) return null;
  return {
    team: cleanText(match[1]),
    heading: text,
    runs: Number(match[2]),
    // no wicket count in the heading means the side was bowled out
    wickets: match[3] === undefined ? 10 : Number(match[3]),
    overs: Number(match[4]),
    batsmen: [],
    bowlers: [],
  };
}

/**
 * Scrapes a scorecard page into a raw detail tree. Rows are keyed by their
 * table headers and kept as found; filtering is left to normalization.
 */
export function parseScorecardHtml(html: string, url: string): ScrapedScorecard {
  const $ = cheerio.load(html);
  const leaves = $("body *").filter((_, element) => $(element).children().length === 0);
  const leafTexts = leaves.map((_, element) => cleanText($(element).text())).get();

  const innings: ScrapedInnings[] = [];
  let current: ScrapedInnings | null = null;

  $("body *").each((_, element) => {
    const node = $(element);
    if (node.is("table")) {
      const headerCells = node.find("thead th").length ? node.find("thead th") : node.find("tr").first().find("th");
      const headers = headerCells.map((__, cell) => cleanText($(cell).text())).get();
      const kind = classifyTable(headers);
      if (!kind || !current) return;
      const cellRows = node
        .find("tbody tr")
        .toArray()
        .map((tr) => $(tr).find("td").map((__, td) => cleanText($(td).text())).get());
      if (kind === "batting") {
        current.batsmen.push(...toRows(cellRows, headers, "batsman"));
        const extras = extrasFrom(current.batsmen);
        if (extras !== undefined) current.extras = extras;
      } else {
        current.bowlers.push(...toRows(cellRows, headers, "bowler"));
      }
      return;
    }
    if (node.children().length || node.closest("table").length) return;
    const heading = parseHeading(cleanText(node.text()));
    if (heading) {
      current = heading;
      innings.push(heading);
    }
  });

  const pomLabel = leaves.filter((_, element) => /player of the match/i.test($(element).text())).first();
  const pomName = pomLabel.length ? cleanText(pomLabel.closest("div").find("a").first().text()) : "";
  const groundName = cleanText($("a[href*='/cricket-grounds/']").first().text());
  const dateText = leafTexts.map((text) => text.match(DATE_PATTERN)?.[0]).find(Boolean);

  return {
    match: {
      objectId: matchIdFromUrl(url),
      title: cleanText($("h1").first().text()) || null,
      statusText: leafTexts.find((text) => RESULT_PATTERN.test(text)) ?? null,
      ground: groundName ? { name: groundName } : null,
      startDate: dateText ?? null,
      url,
      innings,
      playerOfMatch: pomName || null,
    },
  };
}
