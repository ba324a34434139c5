import type { HTTPClient } from "./HTTPClient";
import type { Logger } from "./logger";

/**
 * Whether the SP forces re-authentication at the IdP. `"unset"` leaves the
 * decision to the protocol default.
 */
export type ForceAuthn = boolean | "unset";

export interface MiddlewareOptions {
    url: string | URL;
    key: string;
    certificate: string;
    logger?: Logger;
    allowIDPInitiated?: boolean;
    forceAuthn?: boolean;
    idpMetadata?: EntityDescriptor;
    idpMetadataURL?: string | URL;
    httpClient?: HTTPClient;
    cookieName?: string;
    /** Milliseconds. */
    cookieMaxAge?: number;
    retryCount?: number;
    /** Milliseconds between fetch attempts. */
    retryDelay?: number;
    signal?: AbortSignal;
}

export interface MiddlewareConfig {
    readonly baseURL: string;
    readonly key: string;
    readonly certificate: string;
    readonly logger: Logger;
    readonly metadataURL: string;
    readonly acsURL: string;
    readonly allowIDPInitiated: boolean;
    readonly forceAuthn: ForceAuthn;
    readonly idpMetadata?: EntityDescriptor;
    readonly idpMetadataURL?: string;
    readonly httpClient?: HTTPClient;
    readonly cookieName: string;
    readonly cookieDomain: string;
    readonly cookieMaxAge: number;
    readonly retryCount: number;
    readonly retryDelay: number;
}

export interface FetchOptions {
    httpClient?: HTTPClient;
    signal?: AbortSignal;
}

/** Missing `Binding` and `Location` attributes read as "". */
export interface Endpoint {
    binding: string;
    location: string;
    responseLocation: string | null;
}

export interface IndexedEndpoint extends Endpoint {
    index: number | null;
    isDefault: boolean | null;
}

export interface KeyDescriptor {
    use: "signing" | "encryption" | null;
    /** Bare Base64 bodies of the X509Certificate elements. */
    certificates: string[];
}

interface RoleDescriptor {
    protocolSupportEnumeration: string;
    keyDescriptors: KeyDescriptor[];
    nameIDFormats: string[];
    singleLogoutServices: Endpoint[];
}

export interface IDPSSODescriptor extends RoleDescriptor {
    wantAuthnRequestsSigned: boolean | null;
    singleSignOnServices: Endpoint[];
}

export interface SPSSODescriptor extends RoleDescriptor {
    authnRequestsSigned: boolean | null;
    wantAssertionsSigned: boolean | null;
    assertionConsumerServices: IndexedEndpoint[];
}

export interface EntityDescriptor {
    entityID: string;
    id: string | null;
    validUntil: Date | null;
    cacheDuration: string | null;
    idpSSODescriptors: IDPSSODescriptor[];
    spSSODescriptors: SPSSODescriptor[];
    /** The serialized source element. */
    xml: string;
}

export interface EntitiesDescriptor {
    name: string | null;
    entityDescriptors: EntityDescriptor[];
}
