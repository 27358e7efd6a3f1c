import { DisplayStyle, type BannerItem } from "../domain/BannerItem";
import { BannerType } from "../domain/BannerType";
import { BannerDisplayConfigSchema, describeZodError } from "../validation/schemas";

// Display policy
// - Pure and stateless: built once from validated configuration, then only read.
// - Never mutates items; never throws for unknown ids or styles.
//
// Include/exclude interaction:
// - A non-empty includeIds set is the ONLY criterion; excludeIds is then ignored.
// - An empty includeIds set means "no restriction", and excludeIds applies.

export const DEFAULT_TYPE_MAPPING: Readonly<Record<string, BannerType>> = {
  mentalHealth: BannerType.Wellness,
  dentalBenefits: BannerType.Dental,
  commonly_Used: BannerType.CommonlyUsed,
  medical_plan_123: BannerType.UnderstandYourPlan,
};

export const DEFAULT_DISPLAY_ORDER: readonly BannerType[] = [
  BannerType.Standard,
  BannerType.UnderstandYourPlan,
  BannerType.CommonlyUsed,
  BannerType.Wellness,
  BannerType.Dental,
  BannerType.List,
  BannerType.GoPaper,
];

export type BannerDisplayOptions = Readonly<{
  includeIds?: Iterable<string>;
  excludeIds?: Iterable<string>;
  typeMapping?: Readonly<Record<string, BannerType>>;
  displayOrder?: readonly BannerType[];
}>;

export type BannerSection = Readonly<{
  type: BannerType;
  items: readonly BannerItem[];
}>;

export class BannerDisplayConfig {
  readonly includeIds: ReadonlySet<string>;
  readonly excludeIds: ReadonlySet<string>;
  readonly typeMapping: ReadonlyMap<string, BannerType>;
  readonly displayOrder: readonly BannerType[];

  constructor(options: BannerDisplayOptions = {}) {
    this.includeIds = new Set(options.includeIds ?? []);
    this.excludeIds = new Set(options.excludeIds ?? []);
    this.typeMapping = new Map(Object.entries(options.typeMapping ?? DEFAULT_TYPE_MAPPING));
    this.displayOrder = [...(options.displayOrder ?? DEFAULT_DISPLAY_ORDER)];
  }

  shouldDisplay(item: BannerItem): boolean {
    if (this.includeIds.size > 0) {
      return this.includeIds.has(item.id);
    }
    return !this.excludeIds.has(item.id);
  }

  getBannerType(item: BannerItem): BannerType {
    const mapped = this.typeMapping.get(item.id);
    if (mapped) return mapped;

    switch (item.displayStyle) {
      case DisplayStyle.List:
        return BannerType.List;
      case DisplayStyle.Card:
        return BannerType.GoPaper;
      default:
        return BannerType.Standard;
    }
  }

  // Filter, bucket by type (stable), then emit buckets in displayOrder.
  // Empty buckets are skipped; types missing from displayOrder are not rendered.
  groupForDisplay(items: readonly BannerItem[]): BannerSection[] {
    const buckets = new Map<BannerType, BannerItem[]>();

    for (const item of items) {
      if (!this.shouldDisplay(item)) continue;
      const type = this.getBannerType(item);
      const bucket = buckets.get(type);
      if (bucket) {
        bucket.push(item);
      } else {
        buckets.set(type, [item]);
      }
    }

    const sections: BannerSection[] = [];
    for (const type of this.displayOrder) {
      const bucket = buckets.get(type);
      if (bucket && bucket.length > 0) sections.push({ type, items: bucket });
    }
    return sections;
  }
}

// Validates a raw (JSON-decoded) configuration once and builds the policy.
export function parseBannerDisplayConfig(raw: unknown): BannerDisplayConfig {
  const result = BannerDisplayConfigSchema.safeParse(raw ?? {});
  if (!result.success) {
    throw new Error(`Invalid banner display configuration: ${describeZodError(result.error)}`);
  }

  const { includeIds, excludeIds, typeMapping, displayOrder } = result.data;
  return new BannerDisplayConfig({ includeIds, excludeIds, typeMapping, displayOrder });
}
