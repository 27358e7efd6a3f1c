import type { BannerItem } from "../domain/BannerItem";
import type { BannerType } from "../domain/BannerType";
import type { BannerDisplayConfig, BannerSection } from "./BannerDisplayConfig";

// Rendering boundary
// - The presentation layer receives ordered sections and picks a template per type.
// - The tap handler is the only callback the pipeline exposes outward.

export type BannerTapHandler = (item: BannerItem) => void | Promise<void>;

export type BannerLayoutResponse = Readonly<{
  sections: readonly Readonly<{ type: BannerType; items: readonly BannerItem[] }>[];
  count: number;
}>;

export function composeBannerLayout(items: readonly BannerItem[], config: BannerDisplayConfig): BannerSection[] {
  return config.groupForDisplay(items);
}

export function toLayoutResponse(sections: readonly BannerSection[]): BannerLayoutResponse {
  return {
    sections: sections.map((s) => ({ type: s.type, items: s.items })),
    count: sections.reduce((sum, s) => sum + s.items.length, 0),
  };
}

export class BannerLayoutPresenter {
  private sections: readonly BannerSection[] = [];

  constructor(
    private readonly config: BannerDisplayConfig,
    private readonly onTap: BannerTapHandler,
  ) {}

  // Recomputed fresh on every render pass.
  present(items: readonly BannerItem[]): readonly BannerSection[] {
    this.sections = composeBannerLayout(items, this.config);
    return this.sections;
  }

  // Only banners on screen are tappable. Returns undefined when the id is not displayed.
  async tap(id: string): Promise<BannerItem | undefined> {
    for (const section of this.sections) {
      const item = section.items.find((i) => i.id === id);
      if (item) {
        await this.onTap(item);
        return item;
      }
    }
    return undefined;
  }
}
