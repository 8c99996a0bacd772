import { NormalizationError, errorMessage, missingIdentifier } from "./errors";
import { normalizeMatch } from "./normalize";
import { readSummary } from "./summary";
import type { CanonicalMatchRecord, RawNode } from "./types";

export type DetailFetcher = (stub: RawNode) => Promise<RawNode | null>;

export type BatchOutcome =
  | { match_id: string; status: "ok"; record: CanonicalMatchRecord }
  | { match_id: string; status: "failed"; error: NormalizationError };

export type BatchOptions = {
  concurrency?: number;
};

const DEFAULT_CONCURRENCY = 4;

/** Runs `worker` over `items` with at most `limit` in flight; results keep input order. */
export async function mapWithConcurrency<T, R>(
  items: readonly T[],
  limit: number,
  worker: (item: T, index: number) => Promise<R>
): Promise<R[]> {
  const results: R[] = new Array<R>(items.length);
  let next = 0;

  async function drain() {
    while (next < items.length) {
      const index = next;
      next += 1;
      results[index] = await worker(items[index], index);
    }
  }

  const workers = Math.max(1, Math.min(Math.floor(limit) || 1, items.length));
  await Promise.all(Array.from({ length: workers }, () => drain()));
  return results;
}

async function processStub(stub: RawNode, fetchDetail: DetailFetcher): Promise<BatchOutcome> {
  const { id, title } = readSummary(stub);
  if (!id) {
    return { match_id: "", status: "failed", error: missingIdentifier(title) };
  }

  let detail: RawNode | null;
  try {
    detail = await fetchDetail(stub);
  } catch (error) {
    return {
      match_id: id,
      status: "failed",
      error: new NormalizationError("DetailFetchFailed", `Detail fetch failed for ${id}: ${errorMessage(error)}`, {
        title: title || null,
      }),
    };
  }

  const result = normalizeMatch(stub, detail);
  if (!result.ok) {
    return { match_id: id, status: "failed", error: result.error };
  }
  return { match_id: result.record.match_id, status: "ok", record: result.record };
}

/**
 * Fetches and normalizes every stub independently. A failure is reported
 * for that stub only; the rest of the batch still runs.
 */
export async function normalizeBatch(
  stubs: readonly RawNode[],
  fetchDetail: DetailFetcher,
  options: BatchOptions = {}
): Promise<BatchOutcome[]> {
  const concurrency = options.concurrency ?? DEFAULT_CONCURRENCY;
  return mapWithConcurrency(stubs, concurrency, (stub) => processStub(stub, fetchDetail));
}
