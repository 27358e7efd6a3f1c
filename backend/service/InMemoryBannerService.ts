import type { BannerItem, DisplayStyle } from "../domain/BannerItem";
import { mapAllToDomain } from "../mapping/BannerMapper";
import { decodeBannerPayload, encodeBannerText, type BannerService } from "./BannerService";

// In-memory banner service (reference implementation)
// - Holds the collection for as long as the payload is active.
// - Preserves payload order; duplicate ids are kept.
// - Returns copies of the collection so callers cannot reorder internal state.

export class InMemoryBannerService implements BannerService {
  private banners: readonly BannerItem[] = [];

  constructor(initialPayload?: Uint8Array | string) {
    if (initialPayload === undefined) return;

    if (typeof initialPayload === "string") {
      this.loadFromJSONString(initialPayload);
    } else {
      this.loadFromJSON(initialPayload);
    }
  }

  getAllBanners(): readonly BannerItem[] {
    return [...this.banners];
  }

  getBanners(style: DisplayStyle): readonly BannerItem[] {
    return this.banners.filter((b) => b.displayStyle === style);
  }

  getBanner(id: string): BannerItem | undefined {
    return this.banners.find((b) => b.id === id);
  }

  loadFromJSON(bytes: Uint8Array): number {
    // Decode fully before touching state.
    const next = mapAllToDomain(decodeBannerPayload(bytes));
    this.banners = next;
    return next.length;
  }

  loadFromJSONString(text: string): number {
    return this.loadFromJSON(encodeBannerText(text));
  }
}
