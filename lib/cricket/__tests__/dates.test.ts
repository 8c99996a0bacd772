import { describe, it } from "node:test";
import assert from "node:assert";
import { localDateString, localTimeString, toCalendarDate } from "../dates";

describe("toCalendarDate", () => {
  it("keeps the calendar part of ISO values", () => {
    assert.strictEqual(toCalendarDate("2026-02-15"), "2026-02-15");
    assert.strictEqual(toCalendarDate("2026-02-15T14:00:00"), "2026-02-15");
    assert.strictEqual(toCalendarDate("2026-02-15T23:30:00.000000Z"), "2026-02-15");
  });

  it("reads month names in either order", () => {
    assert.strictEqual(toCalendarDate("Feb 15, 2026"), "2026-02-15");
    assert.strictEqual(toCalendarDate("Sun, 15 February 2026"), "2026-02-15");
  });

  it("reads epoch milliseconds as UTC", () => {
    assert.strictEqual(toCalendarDate(Date.UTC(2026, 1, 15, 12)), "2026-02-15");
  });

  it("rejects impossible and malformed dates", () => {
    assert.strictEqual(toCalendarDate("2026-02-30"), null);
    assert.strictEqual(toCalendarDate("Smarch 3, 2026"), null);
    assert.strictEqual(toCalendarDate("tomorrow"), null);
    assert.strictEqual(toCalendarDate(""), null);
    assert.strictEqual(toCalendarDate(null), null);
    assert.strictEqual(toCalendarDate({ date: "2026-02-15" }), null);
  });
});

describe("local formatting", () => {
  it("pads local date and time parts", () => {
    const date = new Date(2026, 1, 5, 9, 3, 7);
    assert.strictEqual(localDateString(date), "2026-02-05");
    assert.strictEqual(localTimeString(date), "09:03:07");
  });
});
