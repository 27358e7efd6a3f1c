// Payload Source Boundary
// - Supplies raw banner JSON text to the pipeline; never parses or maps it.
// - Timeouts and transport failures belong here, not in the banner service.

export type BannerPayloadSourceKind = "memory" | "http" | "postgres";

export interface BannerPayloadSource {
  readonly kind: BannerPayloadSourceKind;

  // Latest known payload, or null when none has been published yet.
  readLatest(): Promise<string | null>;
}

export interface WritableBannerPayloadSource extends BannerPayloadSource {
  // Called only after the payload decoded successfully.
  save(payload: string): Promise<void>;
}

export function isWritableSource(source: BannerPayloadSource): source is WritableBannerPayloadSource {
  return "save" in source && typeof source.save === "function";
}
