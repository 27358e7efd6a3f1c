// Pipeline errors surfaced to callers of the load operations.
// Lookup misses are NOT errors: getBanner() returns undefined.

export type DecodeAttemptShape = "utf8" | "json" | "array" | "wrapped";

export type DecodeAttempt = Readonly<{
  shape: DecodeAttemptShape;
  message: string;
}>;

export class BannerDecodeError extends Error {
  readonly code = "BANNER_DECODE_FAILED" as const;
  readonly attempts: readonly DecodeAttempt[];

  constructor(attempts: readonly DecodeAttempt[]) {
    const detail = attempts.map((a) => `${a.shape}: ${a.message}`).join("; ");
    super(`Banner payload could not be decoded (${detail}).`);
    this.name = "BannerDecodeError";
    this.attempts = attempts;
  }
}

export class InvalidInputError extends Error {
  readonly code = "INVALID_INPUT" as const;

  constructor(message: string) {
    super(message);
    this.name = "InvalidInputError";
  }
}
