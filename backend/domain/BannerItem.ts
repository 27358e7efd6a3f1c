// NOTE: These are domain contracts only.
// - Produced exclusively by the mapper.
// - No in-place mutation: fields are readonly.
// - A reload replaces the whole collection; items are never patched.

export enum DisplayStyle {
  Banner = "banner",
  List = "list",
  Card = "card",
}

export const DEFAULT_ICON_NAME = "doc.text";

export interface BannerItem {
  readonly id: string;
  readonly title: string;

  // Empty string when the payload carries no description.
  readonly subtitle: string;

  // Symbol name; DEFAULT_ICON_NAME when the payload carries none.
  readonly iconName: string;

  readonly actionText?: string;
  readonly hasNavigationArrow: boolean;
  readonly displayStyle: DisplayStyle;
  readonly route?: string;
}
