export { Middleware, USER_AGENT } from "./Middleware";
export { ServiceProvider } from "./ServiceProvider";
export type { ServiceProviderOptions } from "./ServiceProvider";
export { IDPRegistry } from "./IDPRegistry";
export { decodeEntityDescriptor, decodeEntitiesDescriptor, parseIDPMetadata, METADATA_NS } from "./EntityDescriptor";
export {
    resolveConfig,
    DEFAULT_COOKIE_NAME,
    DEFAULT_COOKIE_MAX_AGE,
    DEFAULT_RETRY_COUNT,
    DEFAULT_RETRY_DELAY,
    METADATA_PATH,
    ACS_PATH,
} from "./config";
export { createHTTPClient } from "./HTTPClient";
export type { HTTPClient, HTTPRequest, HTTPResponse } from "./HTTPClient";
export { createLogger } from "./logger";
export type { Logger, LoggerOptions } from "./logger";
export {
    ConfigurationError,
    XMLDecodeError,
    UnexpectedElementError,
    NoIDPEntityError,
    MetadataFetchError,
} from "./errors";
export type { ElementName } from "./errors";
export type {
    ForceAuthn,
    MiddlewareOptions,
    MiddlewareConfig,
    FetchOptions,
    Endpoint,
    IndexedEndpoint,
    KeyDescriptor,
    IDPSSODescriptor,
    SPSSODescriptor,
    EntityDescriptor,
    EntitiesDescriptor,
} from "./types";
