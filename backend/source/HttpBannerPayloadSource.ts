import type { BannerPayloadSource } from "./BannerPayloadSource";

/*
HTTP payload source
- Read-only: fetches the published banner document from a content endpoint.
- Returns the body text untouched; decoding happens in the banner service.
- No retries here. A failed fetch leaves the loaded banners as they are.
*/

export type HttpBannerPayloadSourceOptions = Readonly<{
  url: string;
  timeoutMs?: number;
  headers?: Readonly<Record<string, string>>;
}>;

export class HttpBannerPayloadSource implements BannerPayloadSource {
  readonly kind = "http" as const;
  private readonly url: string;
  private readonly timeoutMs: number;
  private readonly headers: Readonly<Record<string, string>>;

  constructor(options: HttpBannerPayloadSourceOptions) {
    if (typeof options.url !== "string" || !options.url.trim()) {
      throw new Error("Banner source url must be a non-empty string.");
    }
    this.url = options.url.trim();
    this.timeoutMs = options.timeoutMs ?? 5000;
    this.headers = options.headers ?? {};
  }

  async readLatest(): Promise<string | null> {
    if (typeof fetch !== "function") {
      throw new Error("Global fetch is not available. Provide a fetch polyfill in your runtime if needed.");
    }

    const resp = await fetch(this.url, {
      method: "GET",
      headers: { Accept: "application/json", ...this.headers },
      signal: AbortSignal.timeout(this.timeoutMs),
    });

    // 204: nothing published yet.
    if (resp.status === 204) return null;

    if (!resp.ok) {
      throw new Error(`Banner payload request failed: HTTP ${resp.status}`);
    }

    return resp.text();
  }
}
