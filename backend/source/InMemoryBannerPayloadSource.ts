import type { WritableBannerPayloadSource } from "./BannerPayloadSource";

// In-memory payload source
// - For local runs and unit tests. NOT production storage.
// - Keeps every saved payload in order; the last one wins.

export class InMemoryBannerPayloadSource implements WritableBannerPayloadSource {
  readonly kind = "memory" as const;
  private readonly payloads: string[] = [];

  constructor(initialPayload?: string) {
    if (initialPayload !== undefined) this.payloads.push(initialPayload);
  }

  async readLatest(): Promise<string | null> {
    return this.payloads.length > 0 ? this.payloads[this.payloads.length - 1] : null;
  }

  async save(payload: string): Promise<void> {
    this.payloads.push(payload);
  }

  get history(): readonly string[] {
    return [...this.payloads];
  }
}
