export interface GeoInfo {
  ip: string;
  country?: string;
  region?: string;
  city?: string;
  org?: string;
  timezone?: string;
}

function optionalString(value: unknown): string | undefined {
  return typeof value === "string" && value.trim() ? value : undefined;
}

export function parseIpInfoPayload(payload: Record<string, unknown>): GeoInfo {
  const ip = typeof payload.ip === "string" ? payload.ip.trim() : "";
  return {
    ip,
    country: optionalString(payload.country),
    region: optionalString(payload.region),
    city: optionalString(payload.city),
    org: optionalString(payload.org),
    timezone: optionalString(payload.timezone),
  };
}

export function describeGeo(geo: GeoInfo): string {
  return [geo.ip || "?", geo.country, geo.city, geo.org].filter(Boolean).join(" | ");
}
