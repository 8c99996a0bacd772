export type NormalizationErrorCode = "MissingIdentifier" | "DetailFetchFailed";

export type NormalizationContext = {
  title?: string | null;
  source?: string | null;
};

export class NormalizationError extends Error {
  code: NormalizationErrorCode;
  context: NormalizationContext;

  constructor(code: NormalizationErrorCode, message: string, context: NormalizationContext = {}) {
    super(message);
    this.name = "NormalizationError";
    this.code = code;
    this.context = context;
  }
}

export function missingIdentifier(title: string) {
  return new NormalizationError(
    "MissingIdentifier",
    title ? `No match identifier found for "${title}"` : "No match identifier found",
    { title: title || null }
  );
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
