/**
 * Shapes of the JSON the links endpoint returns. Values arrive untyped, so the
 * model classes read them through the guards below rather than trusting these shapes.
 */
export type Payload = Record<string, unknown>;

export interface EntityPayload {
  id?: string;
  type?: string;
  title?: string;
  artistName?: string;
  thumbnailUrl?: string;
  thumbnailWidth?: number;
  thumbnailHeight?: number;
  apiProvider?: string;
  platforms?: string[];
}

export interface PlatformLinkPayload {
  country?: string;
  url: string;
  nativeAppUriMobile?: string;
  nativeAppUriDesktop?: string;
  entityUniqueId?: string;
}

export interface LinksPayload {
  entityUniqueId?: string;
  userCountry?: string;
  pageUrl?: string;
  entitiesByUniqueId?: { [uniqueId: string]: EntityPayload };
  linksByPlatform?: { [platform: string]: PlatformLinkPayload };
}

export interface ErrorPayload {
  statusCode?: number;
  code?: string;
}

export function isPayload(value: unknown): value is Payload {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function optionalString(value: unknown): string | undefined {
  return typeof value === "string" ? value : undefined;
}

export function optionalNumber(value: unknown): number | undefined {
  return typeof value === "number" && Number.isFinite(value) ? value : undefined;
}
