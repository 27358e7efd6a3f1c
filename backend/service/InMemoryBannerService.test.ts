import { describe, expect, it } from "vitest";
import { DisplayStyle } from "../domain/BannerItem";
import { BannerDecodeError, InvalidInputError } from "../domain/BannerErrors";
import { decodeBannerPayload, encodeBannerText } from "./BannerService";
import { InMemoryBannerService } from "./InMemoryBannerService";

const encoder = new TextEncoder();

const MIXED_PAYLOAD = JSON.stringify([
  { id: "welcome", title: "Welcome", displayStyle: "banner" },
  { id: "estimator", title: "Cost Estimator", displayStyle: "list" },
  { id: "paperless", title: "Go paperless", displayStyle: "card" },
  { id: "drug-cost", title: "Drug Cost", displayStyle: "list" },
]);

function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  throw new Error("expected function to throw");
}

describe("InMemoryBannerService", () => {
  it("starts empty", () => {
    const service = new InMemoryBannerService();
    expect(service.getAllBanners()).toEqual([]);
    expect(service.getBanner("anything")).toBeUndefined();
  });

  it("loads a bare array from a string", () => {
    const service = new InMemoryBannerService();
    const loaded = service.loadFromJSONString('[{ "id": "test-id", "title": "Test Title" }]');

    expect(loaded).toBe(1);
    expect(service.getAllBanners()).toHaveLength(1);
    expect(service.getBanner("test-id")?.title).toBe("Test Title");
  });

  it("loads the wrapped shape from bytes, keeping order", () => {
    const service = new InMemoryBannerService();
    const response = { banners: [{ id: "1", title: "Test Banner" }, { id: "2" }, { id: "3", title: "Third" }] };

    service.loadFromJSON(encoder.encode(JSON.stringify(response)));

    expect(service.getAllBanners().map((b) => b.id)).toEqual(["1", "2", "3"]);
  });

  it("filters by style without reordering", () => {
    const service = new InMemoryBannerService(MIXED_PAYLOAD);
    expect(service.getBanners(DisplayStyle.List).map((b) => b.id)).toEqual(["estimator", "drug-cost"]);
    expect(service.getBanners(DisplayStyle.Card).map((b) => b.id)).toEqual(["paperless"]);
  });

  it("keeps duplicate ids and returns the first on lookup", () => {
    const service = new InMemoryBannerService(
      '[{ "id": "dup", "title": "First" }, { "id": "dup", "title": "Second" }]',
    );
    expect(service.getAllBanners()).toHaveLength(2);
    expect(service.getBanner("dup")?.title).toBe("First");
  });

  it("replaces the whole collection on reload", () => {
    const service = new InMemoryBannerService(MIXED_PAYLOAD);
    service.loadFromJSONString('[{ "id": "only" }]');
    expect(service.getAllBanners().map((b) => b.id)).toEqual(["only"]);
  });

  it("leaves the collection untouched when the payload is not JSON", () => {
    const service = new InMemoryBannerService(MIXED_PAYLOAD);

    const err = captureError(() => service.loadFromJSON(encoder.encode("not json")));

    expect(err).toBeInstanceOf(BannerDecodeError);
    expect(service.getAllBanners()).toHaveLength(4);
  });

  it("reports both shape attempts when neither matches", () => {
    const service = new InMemoryBannerService();
    const err = captureError(() => service.loadFromJSONString('{ "items": [] }'));

    expect(err).toBeInstanceOf(BannerDecodeError);
    if (err instanceof BannerDecodeError) {
      expect(err.attempts.map((a) => a.shape)).toEqual(["array", "wrapped"]);
      expect(err.code).toBe("BANNER_DECODE_FAILED");
    }
  });

  it("rejects a payload whose declared fields have the wrong type", () => {
    const service = new InMemoryBannerService('[{ "id": "keep" }]');
    expect(() => service.loadFromJSONString('[{ "id": 7 }]')).toThrow(BannerDecodeError);
    expect(() => service.loadFromJSONString('[{ "id": "x", "hasNavigationArrow": "yes" }]')).toThrow(
      BannerDecodeError,
    );
    expect(service.getAllBanners().map((b) => b.id)).toEqual(["keep"]);
  });

  it("accepts nulls and unknown keys", () => {
    const service = new InMemoryBannerService();
    service.loadFromJSONString(
      JSON.stringify([
        {
          id: "plan",
          title: null,
          elements: {
            plan_name: { value: "Medical Plan", name: "Sample HMO" },
            status: { value: "Status", label: true },
          },
        },
      ]),
    );
    expect(service.getBanner("plan")?.title).toBe("");
  });

  it("rejects text that cannot be encoded as UTF-8", () => {
    const service = new InMemoryBannerService('[{ "id": "keep" }]');
    expect(() => service.loadFromJSONString('[{ "id": "\uD800" }]')).toThrow(InvalidInputError);
    expect(service.getAllBanners()).toHaveLength(1);
  });
});

describe("decodeBannerPayload", () => {
  it("fails on invalid UTF-8 bytes", () => {
    const err = captureError(() => decodeBannerPayload(new Uint8Array([0x5b, 0xff, 0x5d])));
    expect(err).toBeInstanceOf(BannerDecodeError);
    if (err instanceof BannerDecodeError) {
      expect(err.attempts[0].shape).toBe("utf8");
    }
  });

  it("returns DTOs for an empty wrapped payload", () => {
    expect(decodeBannerPayload(encoder.encode('{ "banners": [] }'))).toEqual([]);
  });
});

describe("encodeBannerText", () => {
  it("encodes well-formed text including surrogate pairs", () => {
    expect(Array.from(encodeBannerText("😀"))).toEqual([0xf0, 0x9f, 0x98, 0x80]);
  });
});
