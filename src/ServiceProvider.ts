import * as crypto from "node:crypto";
import { EntityDescriptor, ForceAuthn } from "./types";
import { ConfigurationError } from "./errors";
import { IDPRegistry } from "./IDPRegistry";
import { Logger } from "./logger";
import { errorMessage } from "./utils";

export interface ServiceProviderOptions {
    key: string;
    certificate: string;
    logger: Logger;
    metadataURL: string;
    acsURL: string;
    idpMetadata?: EntityDescriptor;
    forceAuthn?: ForceAuthn;
}

/** The SP identity handed to the protocol engine. */
export class ServiceProvider {
    readonly key: string;
    readonly certificate: string;
    readonly logger: Logger;
    readonly metadataURL: string;
    readonly acsURL: string;
    readonly forceAuthn: ForceAuthn;
    readonly idpMetadatas: IDPRegistry;

    constructor(options: ServiceProviderOptions) {
        try {
            crypto.createPrivateKey(options.key);
        } catch (err) {
            throw new ConfigurationError(`key is not a valid PEM private key: ${errorMessage(err)}`, { cause: err });
        }
        try {
            new crypto.X509Certificate(options.certificate);
        } catch (err) {
            throw new ConfigurationError(`certificate is not a valid PEM certificate: ${errorMessage(err)}`, { cause: err });
        }

        this.key = options.key;
        this.certificate = options.certificate;
        this.logger = options.logger;
        this.metadataURL = options.metadataURL;
        this.acsURL = options.acsURL;
        this.forceAuthn = options.forceAuthn ?? "unset";
        this.idpMetadatas = new IDPRegistry(options.idpMetadata);
    }

    /** The most recently registered IdP, for single-IdP callers. */
    get idpMetadata(): EntityDescriptor | null {
        return this.idpMetadatas.primary;
    }
}
