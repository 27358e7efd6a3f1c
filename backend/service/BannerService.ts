import type { BannerItem, DisplayStyle } from "../domain/BannerItem";
import { BannerDecodeError, InvalidInputError } from "../domain/BannerErrors";
import {
  BannerDTOArraySchema,
  BannerResponseSchema,
  describeZodError,
  type BannerDTO,
} from "../validation/schemas";

// Banner Service Boundary
// - The ONLY owner of the mapped banner collection.
// - No network, no persistence: callers hand over bytes or text.
// - Single writer: loads must be serialized by the caller (see BannerUseCases).
//
// Load semantics:
// - All-or-nothing. A failed load leaves the previous collection untouched.
// - A successful load replaces the whole collection (no merge, no de-duplication).

export interface BannerService {
  // Insertion order = payload array order.
  getAllBanners(): readonly BannerItem[];

  // Stable filter.
  getBanners(style: DisplayStyle): readonly BannerItem[];

  // First match by id; undefined is a normal outcome.
  getBanner(id: string): BannerItem | undefined;

  // Returns the number of banners loaded.
  loadFromJSON(bytes: Uint8Array): number;
  loadFromJSONString(text: string): number;
}

const utf8Decoder = new TextDecoder("utf-8", { fatal: true });
const utf8Encoder = new TextEncoder();

// Unpaired UTF-16 surrogates have no UTF-8 encoding.
const LONE_SURROGATE = /[\uD800-\uDBFF](?![\uDC00-\uDFFF])|(?<![\uD800-\uDBFF])[\uDC00-\uDFFF]/;

function messageOf(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

// Invalid UTF-8 is a decode failure, never replaced with U+FFFD.
export function decodeBannerText(bytes: Uint8Array): string {
  try {
    return utf8Decoder.decode(bytes);
  } catch (err) {
    throw new BannerDecodeError([{ shape: "utf8", message: messageOf(err) }]);
  }
}

// Bare array first, then the { banners: [...] } wrapper.
export function decodeBannerPayload(bytes: Uint8Array): BannerDTO[] {
  const text = decodeBannerText(bytes);

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (err) {
    throw new BannerDecodeError([{ shape: "json", message: messageOf(err) }]);
  }

  const asArray = BannerDTOArraySchema.safeParse(parsed);
  if (asArray.success) return asArray.data;

  const wrapped = BannerResponseSchema.safeParse(parsed);
  if (wrapped.success) return wrapped.data.banners;

  throw new BannerDecodeError([
    { shape: "array", message: describeZodError(asArray.error) },
    { shape: "wrapped", message: describeZodError(wrapped.error) },
  ]);
}

export function encodeBannerText(text: string): Uint8Array {
  if (typeof text !== "string") {
    throw new InvalidInputError("Banner payload must be a string.");
  }
  if (LONE_SURROGATE.test(text)) {
    throw new InvalidInputError("Banner payload is not encodable as UTF-8 (unpaired surrogate).");
  }
  return utf8Encoder.encode(text);
}
