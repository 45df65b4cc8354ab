/********************************************
 * utils/platform.ts
 *
 * Closed sets of names the song.link API uses: the platforms links can point to,
 * the providers entity metadata comes from, and the entity types.
 *
 * Anything outside these sets is treated as unknown and dropped from responses.
 ********************************************/

export const PLATFORM_NAMES = [
  "spotify",
  "itunes",
  "appleMusic",
  "youtube",
  "youtubeMusic",
  "google",
  "googleStore",
  "pandora",
  "deezer",
  "tidal",
  "amazonStore",
  "amazonMusic",
  "soundcloud",
  "napster",
  "yandex",
  "spinrilla",
  "audius",
  "audiomack",
  "anghami",
  "boomplay"
] as const;

export const API_PROVIDERS = [
  "spotify",
  "itunes",
  "youtube",
  "google",
  "pandora",
  "deezer",
  "tidal",
  "amazon",
  "soundcloud",
  "napster",
  "yandex",
  "spinrilla",
  "audius",
  "audiomack",
  "anghami",
  "boomplay"
] as const;

export const ENTITY_TYPES = ["song", "album"] as const;

export type PlatformName = (typeof PLATFORM_NAMES)[number];
export type APIProvider = (typeof API_PROVIDERS)[number];
export type EntityType = (typeof ENTITY_TYPES)[number];

const platformNames: ReadonlySet<string> = new Set(PLATFORM_NAMES);
const apiProviders: ReadonlySet<string> = new Set(API_PROVIDERS);
const entityTypes: ReadonlySet<string> = new Set(ENTITY_TYPES);

export function isPlatformName(value: unknown): value is PlatformName {
  return typeof value === "string" && platformNames.has(value);
}

export function isAPIProvider(value: unknown): value is APIProvider {
  return typeof value === "string" && apiProviders.has(value);
}

export function isEntityType(value: unknown): value is EntityType {
  return typeof value === "string" && entityTypes.has(value);
}
