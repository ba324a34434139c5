import { setTimeout as sleep } from "node:timers/promises";
import { EntityDescriptor, FetchOptions, MiddlewareConfig, MiddlewareOptions } from "./types";
import { ConfigurationError, MetadataFetchError } from "./errors";
import { createHTTPClient, HTTPRequest } from "./HTTPClient";
import { parseIDPMetadata } from "./EntityDescriptor";
import { parseURL, resolveConfig } from "./config";
import { ServiceProvider } from "./ServiceProvider";
import { errorMessage } from "./utils";

export const USER_AGENT = "Node.js; saml-idp-bootstrap";

export class Middleware {
    readonly serviceProvider: ServiceProvider;
    readonly allowIDPInitiated: boolean;
    readonly cookieName: string;
    readonly cookieDomain: string;
    readonly cookieMaxAge: number;
    readonly retryCount: number;
    readonly retryDelay: number;
    private readonly config: MiddlewareConfig;

    /**
     * Resolves the configuration without fetching anything. Remote metadata
     * needs `create`, so `idpMetadataURL` is rejected here.
     */
    constructor(options: MiddlewareOptions) {
        if (options.idpMetadataURL) {
            throw new ConfigurationError("idpMetadataURL requires Middleware.create.");
        }
        this.config = resolveConfig(options);
        this.serviceProvider = new ServiceProvider({
            key: this.config.key,
            certificate: this.config.certificate,
            logger: this.config.logger,
            metadataURL: this.config.metadataURL,
            acsURL: this.config.acsURL,
            idpMetadata: this.config.idpMetadata,
            forceAuthn: this.config.forceAuthn,
        });
        this.allowIDPInitiated = this.config.allowIDPInitiated;
        this.cookieName = this.config.cookieName;
        this.cookieDomain = this.config.cookieDomain;
        this.cookieMaxAge = this.config.cookieMaxAge;
        this.retryCount = this.config.retryCount;
        this.retryDelay = this.config.retryDelay;
    }

    /**
     * Async factory. When `idpMetadataURL` is set the returned promise settles
     * only after the IdP metadata has been fetched and registered, and rejects
     * with the fetch error if that fails.
     */
    static async create(options: MiddlewareOptions): Promise<Middleware> {
        const { idpMetadataURL, signal, ...rest } = options;
        const middleware = new Middleware(rest);
        if (idpMetadataURL) {
            await middleware.fetchIDPMetadata(idpMetadataURL, { httpClient: middleware.config.httpClient, signal });
        }
        return middleware;
    }

    /** Parses the metadata and registers its IdP under the entity ID. */
    addIDPMetadata(metadata: string | Buffer): EntityDescriptor {
        const entity = parseIDPMetadata(metadata);
        this.serviceProvider.idpMetadatas.add(entity);
        this.serviceProvider.logger.debug(`registered IdP metadata for ${entity.entityID}`);
        return entity;
    }

    /**
     * Fetches IdP metadata, retrying transport failures and non-200 responses
     * up to `retryCount` times with a fixed delay between attempts. Parse
     * failures of a fetched document are not retried.
     */
    async fetchIDPMetadata(idpMetadataURL: string | URL, options: FetchOptions = {}): Promise<EntityDescriptor> {
        const client = options.httpClient ?? createHTTPClient();
        const { signal } = options;
        const url = parseURL(idpMetadataURL, "idpMetadataURL").toString();
        const request: HTTPRequest = {
            headers: { "User-Agent": USER_AGENT },
            signal,
        };

        for (let attempt = 1; ; attempt++) {
            signal?.throwIfAborted();

            let data: string | Buffer;
            try {
                const res = await client.get(url, request);
                if (res.status !== 200) {
                    throw new MetadataFetchError(url, res.status, res.statusText);
                }
                data = res.data;
            } catch (err) {
                if (attempt > this.retryCount || signal?.aborted) {
                    throw err;
                }
                this.serviceProvider.logger.warn(`${url}: ${errorMessage(err)} (will retry)`);
                await sleep(this.retryDelay, undefined, { signal });
                continue;
            }

            return this.addIDPMetadata(data);
        }
    }
}
