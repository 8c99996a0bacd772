import type { FieldPath } from "./resolve";

// Candidate paths per logical field, across CricketData (cricapi),
// ESPNcricinfo JSON, ESPNcricinfo scorecard HTML and Sportmonks payloads.
// Order matters: earlier paths win. A new source should only need new paths here.

type PathList = readonly FieldPath[];

export const MATCH_PATHS = {
  id: ["objectId", "id", "matchId", "match_id", "fixture_id"],
  title: ["name", "title", "fixtureName"],
  series: ["series", "series.longName", "series.name", "seriesName", "series_name", "league.name"],
  status: ["statusText", "note", "status", "result"],
  ended: ["matchEnded", "match_ended", "ended"],
  startDate: ["date", "dateTimeGMT", "startDate", "startTime", "starting_at", "start_date"],
  venue: ["venue", "ground.longName", "ground.name", "venue.name"],
  city: ["ground.town.name", "ground.town", "ground.city", "venue.city", "city"],
};

/** Where the match-level object sits inside a detail payload. */
export const DETAIL_MATCH_WRAPPERS: PathList = ["match", "content.match", "data"];

/** Tried in order against the detail payload; first non-empty list wins. */
export const INNINGS_LOCATIONS: PathList = [
  "scorecard",
  "innings",
  "match.innings",
  "content.innings",
  "content.match.innings",
  "content.scorecard.innings",
  "data.scorecard",
];

export const TEAM_PATHS = {
  list: ["teams"],
  info: ["teamInfo"],
  name: ["team.longName", "team.name", "longName", "name"],
  shortName: ["team.abbreviation", "abbreviation", "shortname", "shortName", "short_name", "code"],
  sides: ["localteam", "visitorteam"],
};

export const TOSS_PATHS = {
  winner: [
    "tossResults.tossWinner",
    "tossResults.winningTeam.longName",
    "tossResults.winningTeam.name",
    "toss.winner",
    "tossWinner",
    "toss_winner",
  ],
  decision: [
    "tossResults.tossDecision",
    "tossResults.decision",
    "toss.decision",
    "tossDecision",
    "tossChoice",
    "tossWinnerChoice",
    "elected",
  ],
};

export const PLAYER_OF_MATCH_PATHS = {
  direct: ["playerOfMatch", "playerOfMatch.0.name", "playerOfMatch.name", "playerOfMatch.longName"],
  alternate: ["player_of_match", "PlayerOfMatch", "manOfMatch", "man_of_match", "manofmatch.fullname"],
  awards: ["awards", "content.awards", "match.awards"],
  awardType: ["awardType", "type"],
  awardPlayer: ["player.longName", "player.name", "playerName", "name"],
};

/** Exact, case-sensitive award type markers for the player of the match. */
export const PLAYER_OF_MATCH_AWARD_TYPES: readonly string[] = ["PLAYER_OF_MATCH", "player of the match"];

export const INNINGS_PATHS = {
  team: ["inningsTeamName", "team.longName", "team.name", "team", "teamName", "batting_team", "inning"],
  runs: ["inningsRuns", "runs", "r", "total", "score.runs"],
  wickets: ["inningsWickets", "wickets", "w"],
  overs: ["inningsOvers", "overs", "o"],
  extras: ["extras.total", "extras", "inningsExtras", "extra"],
  batting: ["batting", "batsmen", "inningBatsmen", "batters"],
  bowling: ["bowling", "bowlers", "inningBowlers"],
  fallOfWickets: ["fallOfWickets", "fall_of_wickets", "inningWickets", "fow"],
};

export const BATTING_PATHS = {
  name: [
    "batsmanName",
    "batsman.name",
    "batsman.longName",
    "batsman.fullname",
    "player.longName",
    "player.name",
    "player_name",
    "name",
    "batsman",
    "batter",
  ],
  runs: ["runs", "r", "R", "score"],
  balls: ["balls", "b", "B", "ballsFaced", "ball"],
  fours: ["fours", "4s", "four_x"],
  sixes: ["sixes", "6s", "six_x"],
  strikeRate: ["strikeRate", "strike_rate", "sr", "SR", "rate"],
  dismissal: ["dismissalText.long", "dismissalText", "dismissal-text", "dismissal", "dismissal-wicket"],
  didNotBat: ["dismissal-wicket", "battedType", "dismissal"],
};

export const BOWLING_PATHS = {
  name: [
    "bowlerName",
    "bowler.name",
    "bowler.longName",
    "bowler.fullname",
    "player.longName",
    "player.name",
    "player_name",
    "name",
    "bowler",
  ],
  overs: ["overs", "o", "O"],
  maidens: ["maidens", "m", "M", "medians"],
  runs: ["conceded", "runs", "r", "R"],
  wickets: ["wickets", "w", "W"],
  economy: ["economy", "economyRate", "econ", "ECON", "eco", "rate"],
};

// Sportmonks keeps innings totals in `scoreboards` and batting/bowling rows
// in flat lists tagged with the scoreboard they belong to.
export const SCOREBOARD_PATHS = {
  boards: ["scoreboards"],
  type: ["type"],
  key: ["scoreboard"],
  teamId: ["team_id"],
  batting: ["batting"],
  bowling: ["bowling"],
};

/** Case-insensitive substrings marking a batting row that is not a player. */
export const NON_PLAYER_MARKERS: readonly string[] = [
  "extras",
  "total",
  "did not bat",
  "fall of wickets",
  "yet to bat",
];
