export interface ElementName {
    namespaceURI: string | null;
    localName: string;
}

export class ConfigurationError extends Error {
    constructor(message: string, options?: ErrorOptions) {
        super(message, options);
        this.name = "ConfigurationError";
    }
}

/** The metadata document is not well-formed XML or does not fit the metadata schema. */
export class XMLDecodeError extends Error {
    constructor(message: string, options?: ErrorOptions) {
        super(message, options);
        this.name = "XMLDecodeError";
    }
}

/**
 * The document root is not the element the decoder was asked for. Callers
 * branch on `actual` to pick another decoder.
 */
export class UnexpectedElementError extends XMLDecodeError {
    constructor(public readonly expected: string, public readonly actual: ElementName) {
        super(`expected element <${expected}> but found <${actual.localName}>` +
            (actual.namespaceURI ? ` in namespace ${actual.namespaceURI}` : ""));
        this.name = "UnexpectedElementError";
    }
}

export class NoIDPEntityError extends Error {
    constructor() {
        super("no entity found with IDPSSODescriptor");
        this.name = "NoIDPEntityError";
    }
}

export class MetadataFetchError extends Error {
    constructor(
        public readonly url: string,
        public readonly status: number,
        public readonly statusText: string,
    ) {
        super(`${status} ${statusText}`.trim());
        this.name = "MetadataFetchError";
    }
}
