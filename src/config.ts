import { MiddlewareConfig, MiddlewareOptions } from "./types";
import { ConfigurationError } from "./errors";
import { createLogger } from "./logger";
import { appendPath, errorMessage } from "./utils";

export const DEFAULT_COOKIE_NAME = "token";
export const DEFAULT_COOKIE_MAX_AGE = 60 * 60 * 1000;
export const DEFAULT_RETRY_COUNT = 10;
export const DEFAULT_RETRY_DELAY = 5000;

export const METADATA_PATH = "/saml/metadata";
export const ACS_PATH = "/saml/acs";

export function parseURL(value: string | URL, field: string): URL {
    try {
        return new URL(value.toString());
    } catch (err) {
        throw new ConfigurationError(`${field} is not a valid URL: ${errorMessage(err)}`, { cause: err });
    }
}

/** Fills defaults and derives the SP endpoints. The result is frozen. */
export function resolveConfig(options: MiddlewareOptions): MiddlewareConfig {
    if (!options.url) {
        throw new ConfigurationError("url is required.");
    }
    const baseURL = parseURL(options.url, "url");

    if (!options.key) {
        throw new ConfigurationError("key is required.");
    }
    if (!options.certificate) {
        throw new ConfigurationError("certificate is required.");
    }

    const retryCount = options.retryCount ?? DEFAULT_RETRY_COUNT;
    if (!Number.isInteger(retryCount) || retryCount < 0) {
        throw new ConfigurationError(`retryCount must be a non-negative integer, got ${retryCount}.`);
    }
    const retryDelay = options.retryDelay ?? DEFAULT_RETRY_DELAY;
    if (!Number.isFinite(retryDelay) || retryDelay < 0) {
        throw new ConfigurationError(`retryDelay must be a non-negative number, got ${retryDelay}.`);
    }
    const cookieMaxAge = options.cookieMaxAge ?? DEFAULT_COOKIE_MAX_AGE;
    if (!Number.isFinite(cookieMaxAge) || cookieMaxAge <= 0) {
        throw new ConfigurationError(`cookieMaxAge must be positive, got ${cookieMaxAge}.`);
    }
    const cookieName = options.cookieName ?? DEFAULT_COOKIE_NAME;
    if (cookieName.length === 0) {
        throw new ConfigurationError("cookieName must not be empty.");
    }

    const idpMetadataURL = options.idpMetadataURL
        ? parseURL(options.idpMetadataURL, "idpMetadataURL").toString()
        : undefined;

    return Object.freeze({
        baseURL: baseURL.toString(),
        key: options.key,
        certificate: options.certificate,
        logger: options.logger ?? createLogger(),
        metadataURL: appendPath(baseURL, METADATA_PATH),
        acsURL: appendPath(baseURL, ACS_PATH),
        allowIDPInitiated: options.allowIDPInitiated ?? false,
        forceAuthn: options.forceAuthn ?? false,
        idpMetadata: options.idpMetadata,
        idpMetadataURL,
        httpClient: options.httpClient,
        cookieName,
        cookieDomain: baseURL.host,
        cookieMaxAge,
        retryCount,
        retryDelay,
    });
}
