import { z } from "zod";
import { DisplayStyle } from "../domain/BannerItem";
import { BannerType } from "../domain/BannerType";

// Banner Pipeline — Wire Schemas (Zod)
//
// Decodes incoming banner payloads before they reach the mapper.
// - Optional fields accept JSON null as "absent".
// - Unknown keys are stripped, not rejected (producers add extras such as "label").
// - A declared field with the wrong type fails the whole payload shape.

// --- Elements ---

export const ElementDTOSchema = z.object({
  name: z.string().nullish(),
  value: z.string().nullish(),
  title: z.string().nullish(),
  variations: z.record(z.string()).nullish(),
});

// --- Banners ---

export const BannerDTOSchema = z.object({
  id: z.string(),
  uuid: z.string().nullish(),
  path: z.string().nullish(),
  name: z.string().nullish(),
  title: z.string().nullish(),
  actionText: z.string().nullish(),
  hasNavigationArrow: z.boolean().nullish(),
  displayStyle: z.string().nullish(),
  route: z.string().nullish(),
  elements: z.record(ElementDTOSchema).nullish(),
  elementsOrder: z.array(z.string()).nullish(),
});

export const BannerDTOArraySchema = z.array(BannerDTOSchema);

export const BannerResponseSchema = z.object({
  banners: z.array(BannerDTOSchema),
});

export type ElementDTO = z.infer<typeof ElementDTOSchema>;
export type BannerDTO = z.infer<typeof BannerDTOSchema>;
export type BannerResponse = z.infer<typeof BannerResponseSchema>;

// --- Display configuration (validated once at startup) ---

const BannerTypeSchema = z.nativeEnum(BannerType);

export const BannerDisplayConfigSchema = z.object({
  includeIds: z.array(z.string().min(1)).default([]),
  excludeIds: z.array(z.string().min(1)).default([]),
  typeMapping: z.record(BannerTypeSchema).optional(),
  displayOrder: z.array(BannerTypeSchema).min(1).optional(),
}).refine(
  (data: { displayOrder?: BannerType[] }) =>
    !data.displayOrder || new Set(data.displayOrder).size === data.displayOrder.length,
  { message: "displayOrder must not list a banner type more than once", path: ["displayOrder"] },
);

// --- API request schemas ---

export const BannerStyleQuerySchema = z.object({
  style: z.nativeEnum(DisplayStyle).optional(),
});

export function describeZodError(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
    .join("; ");
}
