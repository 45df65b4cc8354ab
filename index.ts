export { SongLink } from "./structs/SongLink";
export { APIResponse } from "./structs/APIResponse";
export type { APIResponseData } from "./structs/APIResponse";
export { EntityUniqueId } from "./structs/EntityUniqueId";
export type { EntityUniqueIdData } from "./structs/EntityUniqueId";
export { Platform } from "./structs/Platform";
export type { PlatformData } from "./structs/Platform";
export { ConnectionPool } from "./structs/ConnectionPool";
export type { Connection, ConnectionPoolOptions } from "./structs/ConnectionPool";
export { Dispatcher } from "./structs/Dispatcher";
export type { DispatcherOptions, JsonDecoder, QueryParams } from "./structs/Dispatcher";
export { CachedTransport } from "./structs/CachedTransport";
export type { CachedTransportOptions } from "./structs/CachedTransport";
export { FileCacheBackend } from "./utils/cache";
export { MemoryCacheBackend } from "./utils/memoryCache";
export {
  SongLinkError,
  ConfigurationError,
  TooManyRequests,
  EntityNotFound,
  APIException
} from "./utils/exceptions";
export {
  PLATFORM_NAMES,
  API_PROVIDERS,
  ENTITY_TYPES,
  isPlatformName,
  isAPIProvider,
  isEntityType
} from "./utils/platform";
export type { PlatformName, APIProvider, EntityType } from "./utils/platform";
export type { CacheBackend, CachedResponse } from "./interfaces/CacheBackend";
export type { SongLinkOptions } from "./interfaces/SongLinkOptions";
export type { LinksPayload, EntityPayload, PlatformLinkPayload, ErrorPayload } from "./interfaces/ApiPayload";
