import { describe, expect, it } from "vitest";
import { DEFAULT_ICON_NAME, DisplayStyle, type BannerItem } from "../domain/BannerItem";
import { BannerType } from "../domain/BannerType";
import { BannerDisplayConfig, DEFAULT_DISPLAY_ORDER, parseBannerDisplayConfig } from "./BannerDisplayConfig";

function item(id: string, displayStyle: DisplayStyle = DisplayStyle.Banner): BannerItem {
  return {
    id,
    title: id,
    subtitle: "",
    iconName: DEFAULT_ICON_NAME,
    hasNavigationArrow: false,
    displayStyle,
  };
}

describe("BannerDisplayConfig.shouldDisplay", () => {
  it("lets a non-empty include set win over the exclude set", () => {
    const config = new BannerDisplayConfig({ includeIds: ["a", "b"], excludeIds: ["a"] });
    expect(config.shouldDisplay(item("a"))).toBe(true);
    expect(config.shouldDisplay(item("b"))).toBe(true);
    expect(config.shouldDisplay(item("c"))).toBe(false);
  });

  it("applies the exclude set when the include set is empty", () => {
    const config = new BannerDisplayConfig({ includeIds: [], excludeIds: ["x"] });
    expect(config.shouldDisplay(item("x"))).toBe(false);
    expect(config.shouldDisplay(item("y"))).toBe(true);
  });

  it("shows everything with no sets configured", () => {
    expect(new BannerDisplayConfig().shouldDisplay(item("any"))).toBe(true);
  });
});

describe("BannerDisplayConfig.getBannerType", () => {
  const config = new BannerDisplayConfig();

  it("derives the type from the display style", () => {
    expect(config.getBannerType(item("p", DisplayStyle.Card))).toBe(BannerType.GoPaper);
    expect(config.getBannerType(item("l", DisplayStyle.List))).toBe(BannerType.List);
    expect(config.getBannerType(item("b", DisplayStyle.Banner))).toBe(BannerType.Standard);
  });

  it("uses the override map before the display style", () => {
    expect(config.getBannerType(item("dentalBenefits", DisplayStyle.Card))).toBe(BannerType.Dental);
    expect(config.getBannerType(item("mentalHealth", DisplayStyle.List))).toBe(BannerType.Wellness);
  });

  it("honours a custom override map in place of the defaults", () => {
    const custom = new BannerDisplayConfig({ typeMapping: { promo: BannerType.CommonlyUsed } });
    expect(custom.getBannerType(item("promo"))).toBe(BannerType.CommonlyUsed);
    expect(custom.getBannerType(item("mentalHealth"))).toBe(BannerType.Standard);
  });
});

describe("BannerDisplayConfig.groupForDisplay", () => {
  it("emits buckets in display order, keeping relative order inside a bucket", () => {
    const config = new BannerDisplayConfig({ displayOrder: [BannerType.List, BannerType.Standard] });
    const sections = config.groupForDisplay([
      item("X", DisplayStyle.List),
      item("S", DisplayStyle.Banner),
      item("Y", DisplayStyle.List),
    ]);

    expect(sections.map((s) => [s.type, s.items.map((i) => i.id)])).toEqual([
      [BannerType.List, ["X", "Y"]],
      [BannerType.Standard, ["S"]],
    ]);
  });

  it("skips empty buckets and types missing from the order", () => {
    const config = new BannerDisplayConfig({ displayOrder: [BannerType.Dental, BannerType.Standard] });
    const sections = config.groupForDisplay([item("card", DisplayStyle.Card), item("plain")]);

    expect(sections).toEqual([{ type: BannerType.Standard, items: [item("plain")] }]);
  });

  it("filters before grouping", () => {
    const config = new BannerDisplayConfig({ excludeIds: ["hidden"] });
    const sections = config.groupForDisplay([item("hidden", DisplayStyle.List), item("shown", DisplayStyle.List)]);

    expect(sections).toEqual([{ type: BannerType.List, items: [item("shown", DisplayStyle.List)] }]);
  });

  it("uses the default order when none is given", () => {
    const sections = new BannerDisplayConfig().groupForDisplay([
      item("paper", DisplayStyle.Card),
      item("list", DisplayStyle.List),
      item("dentalBenefits"),
      item("medical_plan_123"),
      item("welcome"),
    ]);

    expect(sections.map((s) => s.type)).toEqual([
      BannerType.Standard,
      BannerType.UnderstandYourPlan,
      BannerType.Dental,
      BannerType.List,
      BannerType.GoPaper,
    ]);
  });
});

describe("parseBannerDisplayConfig", () => {
  it("applies defaults to an empty object", () => {
    const config = parseBannerDisplayConfig({});
    expect(config.displayOrder).toEqual(DEFAULT_DISPLAY_ORDER);
    expect(config.typeMapping.get("commonly_Used")).toBe(BannerType.CommonlyUsed);
    expect(config.includeIds.size).toBe(0);
  });

  it("builds typed sets and maps from JSON values", () => {
    const config = parseBannerDisplayConfig({
      includeIds: ["welcome", "premium"],
      typeMapping: { premium: "goPaper" },
      displayOrder: ["goPaper", "standard"],
    });
    expect([...config.includeIds]).toEqual(["welcome", "premium"]);
    expect(config.typeMapping.get("premium")).toBe(BannerType.GoPaper);
    expect(config.displayOrder).toEqual([BannerType.GoPaper, BannerType.Standard]);
  });

  it("rejects unknown banner types", () => {
    expect(() => parseBannerDisplayConfig({ displayOrder: ["hero"] })).toThrow(
      /Invalid banner display configuration/,
    );
  });

  it("rejects a display order that repeats a type", () => {
    expect(() => parseBannerDisplayConfig({ displayOrder: ["list", "standard", "list"] })).toThrow(
      "displayOrder: displayOrder must not list a banner type more than once",
    );
  });
});
