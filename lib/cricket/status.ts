const COMPLETED_MARKERS = ["won", "tied", "abandoned", "no result"];

/**
 * A match counts as completed when the source says it ended, or when the
 * status text reads like a result. Abandoned and no-result matches count too.
 */
export function isCompleted(statusText: string, endedFlag: boolean): boolean {
  if (endedFlag === true) return true;
  const lowered = statusText.toLowerCase();
  return COMPLETED_MARKERS.some((marker) => lowered.includes(marker));
}
