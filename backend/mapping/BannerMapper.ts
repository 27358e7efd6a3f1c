import { DEFAULT_ICON_NAME, DisplayStyle, type BannerItem } from "../domain/BannerItem";
import type { BannerDTO, ElementDTO } from "../validation/schemas";

// DTO -> domain mapping
// - Total: never throws, even for a DTO carrying only an id.
// - The same logical value may arrive as a flat field, a keyed element, or an
//   element's own sub-field. Each field resolves through an ordered candidate list.

type Candidate = string | null | undefined;

// First candidate that is a non-empty string, else undefined.
export function firstNonEmpty(...candidates: readonly Candidate[]): string | undefined {
  for (const c of candidates) {
    if (typeof c === "string" && c.length > 0) return c;
  }
  return undefined;
}

function element(dto: BannerDTO, name: string): ElementDTO | undefined {
  const elements = dto.elements;
  if (!elements || !Object.prototype.hasOwnProperty.call(elements, name)) return undefined;
  return elements[name];
}

function resolveDisplayStyle(dto: BannerDTO): DisplayStyle {
  if (dto.displayStyle !== undefined && dto.displayStyle !== null) {
    switch (dto.displayStyle.toLowerCase()) {
      case DisplayStyle.List:
        return DisplayStyle.List;
      case DisplayStyle.Card:
        return DisplayStyle.Card;
      default:
        return DisplayStyle.Banner;
    }
  }

  // No explicit style: infer from the content path or banner name.
  if (dto.path?.includes("list") || dto.name?.includes("list")) return DisplayStyle.List;

  return DisplayStyle.Banner;
}

export function mapToDomain(dto: BannerDTO): BannerItem {
  const titleElement = element(dto, "title");

  const actionText = dto.actionText ?? undefined;
  const route = dto.route ?? undefined;

  return {
    id: firstNonEmpty(element(dto, "id")?.value) ?? dto.id,
    title: firstNonEmpty(titleElement?.title, titleElement?.value, dto.title) ?? "",
    subtitle: firstNonEmpty(element(dto, "description")?.value) ?? "",
    iconName: firstNonEmpty(element(dto, "icon")?.value) ?? DEFAULT_ICON_NAME,
    ...(actionText !== undefined ? { actionText } : {}),
    hasNavigationArrow: dto.hasNavigationArrow ?? false,
    displayStyle: resolveDisplayStyle(dto),
    ...(route !== undefined ? { route } : {}),
  };
}

// Preserves input order.
export function mapAllToDomain(dtos: readonly BannerDTO[]): BannerItem[] {
  return dtos.map((dto) => mapToDomain(dto));
}
