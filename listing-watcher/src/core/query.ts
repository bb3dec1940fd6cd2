import { RegionProfile } from "./dto";

/**
 * Search query for one result page of a profile. firstRow is omitted on
 * the first page, matching what the site itself sends.
 */
export function searchParams(profile: RegionProfile, firstRow: number): Record<string, string> {
  const { filters } = profile;
  const params: Record<string, string> = {
    region: String(profile.region),
    section: profile.sections.join(","),
    kind: String(filters.kind),
    layout: filters.layouts.join(","),
    rentprice: filters.price.join(","),
    area: filters.area.join(","),
    other: filters.other.join(","),
    option: filters.options.join(","),
    order: filters.order,
    orderType: filters.orderType,
  };

  if (firstRow > 0) {
    params.firstRow = String(firstRow);
  }

  return params;
}

export function searchUrl(baseUrl: string, profile: RegionProfile, firstRow: number): string {
  return `${baseUrl}?${new URLSearchParams(searchParams(profile, firstRow)).toString()}`;
}
