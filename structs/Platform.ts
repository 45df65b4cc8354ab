import { isPayload, optionalString } from "../interfaces/ApiPayload";
import { PlatformName, isPlatformName } from "../utils/platform";

export interface PlatformData {
  name: PlatformName;
  country?: string;
  entityUniqueId?: string;
  url: string;
  nativeAppUriMobile?: string;
  nativeAppUriDesktop?: string;
}

/**
 * The link of the queried entity on one platform.
 */
export class Platform {
  public readonly name: PlatformName;
  public readonly country?: string;
  public readonly entityUniqueId?: string;
  public readonly url: string;
  public readonly nativeAppUriMobile?: string;
  public readonly nativeAppUriDesktop?: string;

  public constructor({ name, country, entityUniqueId, url, nativeAppUriMobile, nativeAppUriDesktop }: PlatformData) {
    this.name = name;
    this.country = country;
    this.entityUniqueId = entityUniqueId;
    this.url = url;
    this.nativeAppUriMobile = nativeAppUriMobile;
    this.nativeAppUriDesktop = nativeAppUriDesktop;
  }

  /**
   * Builds a link from one `linksByPlatform` entry. Unknown platform names and
   * entries without a url yield undefined.
   */
  public static from(name: string, raw: unknown): Platform | undefined {
    if (!isPlatformName(name) || !isPayload(raw)) return undefined;

    const url = optionalString(raw.url);
    if (url === undefined) return undefined;

    return new this({
      name,
      country: optionalString(raw.country),
      entityUniqueId: optionalString(raw.entityUniqueId),
      url,
      nativeAppUriMobile: optionalString(raw.nativeAppUriMobile),
      nativeAppUriDesktop: optionalString(raw.nativeAppUriDesktop)
    });
  }
}
