import { isPayload, optionalNumber, optionalString } from "../interfaces/ApiPayload";
import { APIProvider, EntityType, PlatformName, isAPIProvider, isEntityType, isPlatformName } from "../utils/platform";

export interface EntityUniqueIdData {
  uniqueId: string;
  id: string;
  type?: EntityType;
  title?: string;
  artistName?: string;
  thumbnailUrl?: string;
  thumbnailWidth?: number;
  thumbnailHeight?: number;
  apiProvider: APIProvider;
  platforms: PlatformName[];
}

/**
 * One song or album as a single provider knows it, e.g. "SPOTIFY_SONG::0Jcij1eWd5bDMU5iPbxe2i".
 */
export class EntityUniqueId {
  /** Key of this entity in the response, referenced by Platform.entityUniqueId. */
  public readonly uniqueId: string;
  /** The provider's own id. */
  public readonly id: string;
  public readonly type?: EntityType;
  public readonly title?: string;
  public readonly artistName?: string;
  public readonly thumbnailUrl?: string;
  public readonly thumbnailWidth?: number;
  public readonly thumbnailHeight?: number;
  public readonly apiProvider: APIProvider;
  public readonly platforms: readonly PlatformName[];

  public constructor(data: EntityUniqueIdData) {
    this.uniqueId = data.uniqueId;
    this.id = data.id;
    this.type = data.type;
    this.title = data.title;
    this.artistName = data.artistName;
    this.thumbnailUrl = data.thumbnailUrl;
    this.thumbnailWidth = data.thumbnailWidth;
    this.thumbnailHeight = data.thumbnailHeight;
    this.apiProvider = data.apiProvider;
    this.platforms = Object.freeze([...data.platforms]);
  }

  /**
   * Builds an entity from one value of `entitiesByUniqueId`.
   * Returns undefined when the provider is not one we know; unknown platform
   * names are removed from the platform list.
   */
  public static from(uniqueId: string, raw: unknown): EntityUniqueId | undefined {
    if (!isPayload(raw)) return undefined;

    const { apiProvider, type } = raw;
    if (!isAPIProvider(apiProvider)) return undefined;

    const platforms = Array.isArray(raw.platforms) ? raw.platforms.filter(isPlatformName) : [];

    return new this({
      uniqueId,
      id: optionalString(raw.id) ?? uniqueId,
      type: isEntityType(type) ? type : undefined,
      title: optionalString(raw.title),
      artistName: optionalString(raw.artistName),
      thumbnailUrl: optionalString(raw.thumbnailUrl),
      thumbnailWidth: optionalNumber(raw.thumbnailWidth),
      thumbnailHeight: optionalNumber(raw.thumbnailHeight),
      apiProvider,
      platforms
    });
  }
}
