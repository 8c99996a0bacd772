import { describe, it } from "node:test";
import assert from "node:assert";
import {
  DEFAULT_TOURNAMENT_MARKERS,
  DEFAULT_WARM_UP_MARKERS,
  explainSelection,
  explainSelections,
  isCompleted,
  isSelected,
  isTournamentMatch,
  isWarmUp,
  matchesDate,
  matchesNamedFixture,
  selectMatches,
  type SelectionCriteria,
} from "../select";

const indiaPakistan = {
  id: "7",
  name: "India vs Pakistan, 27th Match",
  series: "ICC Men's T20 World Cup 2025-26",
  status: "India won by 6 wickets",
  matchEnded: true,
  date: "2026-02-15",
};

const dailyCriteria: SelectionCriteria = {
  tournament: { markers: DEFAULT_TOURNAMENT_MARKERS },
  excludeWarmUp: { markers: DEFAULT_WARM_UP_MARKERS },
  date: "2026-02-15",
  namedFixture: "India vs Pakistan",
};

describe("selection", () => {
  it("selects a completed tournament fixture on the requested date", () => {
    assert.strictEqual(isSelected(indiaPakistan, dailyCriteria), true);
  });

  it("rejects the same fixture on another date", () => {
    assert.strictEqual(explainSelection(indiaPakistan, { ...dailyCriteria, date: "2026-02-16" }), "date");
  });

  it("excludes a tournament warm-up", () => {
    const warmUp = { ...indiaPakistan, name: "India vs Pakistan Warm-up Match" };
    assert.strictEqual(isTournamentMatch(warmUp.series, warmUp.name), true);
    assert.strictEqual(isWarmUp(warmUp.name, warmUp.series), true);
    assert.strictEqual(explainSelection(warmUp, dailyCriteria), "warm_up");
  });

  it("applies no predicate when the criteria are empty", () => {
    assert.strictEqual(isSelected({ id: "1" }, {}), true);
    assert.strictEqual(isSelected(null, {}), true);
  });

  it("reports the first failing predicate", () => {
    const live = { id: "9", name: "Namibia vs Oman", series: "Asia Cup", status: "Oman need 20 runs" };
    assert.strictEqual(explainSelection(live, { ...dailyCriteria, completedOnly: true }), "tournament");
    assert.strictEqual(explainSelection(live, { completedOnly: true }), "completed");
    assert.strictEqual(explainSelection(indiaPakistan, { processed: new Set(["7"]), date: "bad" }), "already_processed");
  });

  it("keeps matches not in the processed set", () => {
    assert.strictEqual(isSelected(indiaPakistan, { processed: new Set(["8"]) }), true);
  });

  it("filters without reordering", () => {
    const matches = [
      { ...indiaPakistan, id: "1", date: "2026-02-14" },
      { ...indiaPakistan, id: "2" },
      { ...indiaPakistan, id: "3", name: "Sri Lanka vs Australia" },
      { ...indiaPakistan, id: "4", name: "India vs Pakistan, Final" },
      { ...indiaPakistan, id: "5" },
    ];
    const selected = selectMatches(matches, dailyCriteria);
    assert.deepStrictEqual(
      selected.map((match) => match.id),
      ["2", "4", "5"]
    );
  });
});

describe("duplicate listing entries", () => {
  it("keeps one entry per match id", () => {
    const selected = selectMatches([indiaPakistan, { ...indiaPakistan }], { completedOnly: true, processed: new Set() });
    assert.strictEqual(selected.length, 1);
    assert.strictEqual(selected[0], indiaPakistan);
  });

  it("reports the repeat as a duplicate", () => {
    const rejected = { ...indiaPakistan, date: "2026-02-14" };
    const verdicts = explainSelections([rejected, indiaPakistan, { ...indiaPakistan }, { name: "No id" }, { name: "No id" }], {
      date: "2026-02-15",
    });
    assert.deepStrictEqual(
      verdicts.map((verdict) => [verdict.id, verdict.reason]),
      [
        ["7", "date"],
        ["7", null],
        ["7", "duplicate"],
        ["", "date"],
        ["", "date"],
      ]
    );
  });

  it("leaves entries without an id to normalization", () => {
    const verdicts = explainSelections([{ name: "No id" }, { name: "No id" }], {});
    assert.deepStrictEqual(
      verdicts.map((verdict) => verdict.reason),
      [null, null]
    );
  });
});

describe("predicates", () => {
  it("matches tournament markers in series or title, case-insensitively", () => {
    assert.strictEqual(isTournamentMatch("", "ICC T20 qualifier"), true);
    assert.strictEqual(isTournamentMatch("Big Bash League", "Heat vs Stars"), false);
    assert.strictEqual(isTournamentMatch("Big Bash League", "Heat vs Stars", ["big bash"]), true);
  });

  it("ignores empty markers", () => {
    assert.strictEqual(isWarmUp("India vs Pakistan", "", [""]), false);
  });

  it("compares calendar dates across formats", () => {
    assert.strictEqual(matchesDate("2026-02-15T13:30:00", "2026-02-15"), true);
    assert.strictEqual(matchesDate("Feb 15, 2026", "2026-02-15"), true);
    assert.strictEqual(matchesDate("2026-02-15", "not a date"), false);
    assert.strictEqual(matchesDate(undefined, "2026-02-15"), false);
  });

  it("treats a blank fixture name as no filter", () => {
    assert.strictEqual(matchesNamedFixture("Anything", "  "), true);
    assert.strictEqual(matchesNamedFixture("India vs Pakistan", "pakistan"), true);
    assert.strictEqual(matchesNamedFixture("India vs Pakistan", "England"), false);
  });

  it("counts results, ties, abandonments and the ended flag as completed", () => {
    assert.strictEqual(isCompleted("Match tied (India won the Super Over)", false), true);
    assert.strictEqual(isCompleted("Match abandoned without a ball bowled", false), true);
    assert.strictEqual(isCompleted("No result", false), true);
    assert.strictEqual(isCompleted("", true), true);
    assert.strictEqual(isCompleted("Innings break", false), false);
  });
});
