// Presentation buckets. Derived per item at layout time, never persisted.
// The values are the names used in display configuration files.

export enum BannerType {
  Standard = "standard",
  Wellness = "wellness",
  Dental = "dental",
  List = "list",
  GoPaper = "goPaper",
  CommonlyUsed = "commonlyUsed",
  UnderstandYourPlan = "underStandYourPlan",
}
