import { Payload, isPayload, optionalString } from "../interfaces/ApiPayload";
import { PlatformName } from "../utils/platform";
import { EntityUniqueId } from "./EntityUniqueId";
import { Platform } from "./Platform";

export interface APIResponseData {
  entityUniqueId: string;
  userCountry: string;
  pageUrl: string;
  entitiesByUniqueId: EntityUniqueId[];
  linksByPlatform: Platform[];
}

/**
 * Result of one links query.
 */
export class APIResponse {
  public readonly entityUniqueId: string;
  public readonly userCountry: string;
  public readonly pageUrl: string;
  public readonly entitiesByUniqueId: readonly EntityUniqueId[];
  public readonly linksByPlatform: readonly Platform[];

  public constructor(data: APIResponseData) {
    this.entityUniqueId = data.entityUniqueId;
    this.userCountry = data.userCountry;
    this.pageUrl = data.pageUrl;
    this.entitiesByUniqueId = Object.freeze([...data.entitiesByUniqueId]);
    this.linksByPlatform = Object.freeze([...data.linksByPlatform]);
  }

  /**
   * Maps a successful response body. Entities from unknown providers and links
   * for unknown platforms are left out; the two lists are filtered independently.
   * @param body - Decoded JSON body.
   * @param requestedCountry - The userCountry sent with the request, used when the body has none.
   */
  public static from(body: Payload, requestedCountry?: string): APIResponse {
    const entities = isPayload(body.entitiesByUniqueId) ? body.entitiesByUniqueId : {};
    const links = isPayload(body.linksByPlatform) ? body.linksByPlatform : {};

    return new this({
      entityUniqueId: optionalString(body.entityUniqueId) ?? "",
      userCountry: optionalString(body.userCountry) ?? requestedCountry ?? "US",
      pageUrl: optionalString(body.pageUrl) ?? "",
      entitiesByUniqueId: Object.entries(entities)
        .map(([uniqueId, entity]) => EntityUniqueId.from(uniqueId, entity))
        .filter((entity): entity is EntityUniqueId => entity !== undefined),
      linksByPlatform: Object.entries(links)
        .map(([name, link]) => Platform.from(name, link))
        .filter((link): link is Platform => link !== undefined)
    });
  }

  /** The entity the query resolved to, if its provider is known. */
  public get primaryEntity(): EntityUniqueId | undefined {
    return this.getEntity(this.entityUniqueId);
  }

  public get platformNames(): PlatformName[] {
    return this.linksByPlatform.map((link) => link.name);
  }

  public getEntity(uniqueId: string): EntityUniqueId | undefined {
    return this.entitiesByUniqueId.find((entity) => entity.uniqueId === uniqueId);
  }

  public getLink(platform: PlatformName): Platform | undefined {
    return this.linksByPlatform.find((link) => link.name === platform);
  }
}
