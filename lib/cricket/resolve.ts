import type { RawNode } from "./types";

/**
 * Dotted path into an untyped payload. Numeric segments index into arrays,
 * e.g. `"teams.0.team.longName"`.
 */
export type FieldPath = string;

type Coerce<T> = (value: unknown) => T | undefined;

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function step(node: unknown, segment: string): unknown {
  if (Array.isArray(node)) {
    if (!/^\d+$/.test(segment)) return undefined;
    return node[Number(segment)];
  }
  if (isRecord(node) && Object.prototype.hasOwnProperty.call(node, segment)) {
    return node[segment];
  }
  return undefined;
}

export function traverse(node: RawNode, path: FieldPath): unknown {
  if (!path) return undefined;
  let current: unknown = node;
  for (const segment of path.split(".")) {
    if (current === undefined || current === null) return undefined;
    current = step(current, segment);
  }
  return current;
}

function isPresent(value: unknown) {
  if (value === undefined || value === null) return false;
  if (typeof value === "number") return Number.isFinite(value);
  if (typeof value === "string") return value.trim().length > 0;
  return true;
}

/**
 * Returns the value of the first candidate path that resolves to something
 * non-empty. Missing keys, nulls and wrong shapes along a path only mean
 * "not found" for that path.
 */
export function resolve(node: RawNode, paths: readonly FieldPath[], fallback?: unknown): unknown {
  for (const path of paths) {
    const value = traverse(node, path);
    if (isPresent(value)) return value;
  }
  return fallback;
}

function resolveAs<T>(node: RawNode, paths: readonly FieldPath[], coerce: Coerce<T>, fallback: T): T {
  for (const path of paths) {
    const value = traverse(node, path);
    if (!isPresent(value)) continue;
    const coerced = coerce(value);
    if (coerced !== undefined) return coerced;
  }
  return fallback;
}

function toText(value: unknown): string | undefined {
  if (typeof value === "string") return value.replace(/\s+/g, " ").trim();
  if (typeof value === "number" || typeof value === "boolean") return String(value);
  return undefined;
}

export function toNumber(value: unknown): number | undefined {
  if (typeof value === "number") return Number.isFinite(value) ? value : undefined;
  if (typeof value === "string") {
    const trimmed = value.trim();
    if (!trimmed) return undefined;
    const parsed = Number(trimmed);
    return Number.isFinite(parsed) ? parsed : undefined;
  }
  return undefined;
}

function toInt(value: unknown): number | undefined {
  const parsed = toNumber(value);
  return parsed === undefined ? undefined : Math.trunc(parsed);
}

function toBoolean(value: unknown): boolean | undefined {
  if (typeof value === "boolean") return value;
  if (value === 1 || value === 0) return value === 1;
  if (typeof value === "string") {
    const lowered = value.trim().toLowerCase();
    if (lowered === "true") return true;
    if (lowered === "false") return false;
  }
  return undefined;
}

export function resolveString(node: RawNode, paths: readonly FieldPath[], fallback = ""): string {
  return resolveAs(node, paths, toText, fallback);
}

export function resolveInt(node: RawNode, paths: readonly FieldPath[], fallback = 0): number {
  return resolveAs(node, paths, toInt, fallback);
}

export function resolveDecimal(node: RawNode, paths: readonly FieldPath[], fallback = 0): number {
  return resolveAs(node, paths, toNumber, fallback);
}

export function resolveBoolean(node: RawNode, paths: readonly FieldPath[], fallback = false): boolean {
  return resolveAs(node, paths, toBoolean, fallback);
}

export function resolveList(node: RawNode, paths: readonly FieldPath[]): unknown[] {
  return resolveAs<unknown[]>(
    node,
    paths,
    (value) => (Array.isArray(value) && value.length > 0 ? value : undefined),
    []
  );
}

export function resolveRecord(node: RawNode, paths: readonly FieldPath[]): Record<string, unknown> | null {
  return resolveAs<Record<string, unknown> | null>(
    node,
    paths,
    (value) => (isRecord(value) ? value : undefined),
    null
  );
}

/** Same as the single-node helpers, tried against each node in turn. */
export function resolveStringFrom(nodes: readonly RawNode[], paths: readonly FieldPath[], fallback = ""): string {
  for (const node of nodes) {
    const value = resolveString(node, paths);
    if (value) return value;
  }
  return fallback;
}
