import { DOMParser, DOMParserOptions } from "@xmldom/xmldom";
import {
    Endpoint,
    EntitiesDescriptor,
    EntityDescriptor,
    IDPSSODescriptor,
    IndexedEndpoint,
    KeyDescriptor,
    SPSSODescriptor,
} from "./types";
import { ElementName, NoIDPEntityError, UnexpectedElementError, XMLDecodeError } from "./errors";
import { errorMessage } from "./utils";

export const METADATA_NS = "urn:oasis:names:tc:SAML:2.0:metadata";

// Seed the common prefixes so fragments copied out of larger documents
// without their xmlns:* declarations still parse.
const PARSER_OPTIONS: DOMParserOptions = {
    xmlns: {
        md:   METADATA_NS,
        ds:   "http://www.w3.org/2000/09/xmldsig#",
        saml: "urn:oasis:names:tc:SAML:2.0:assertion",
    },
};

type XMLDocument = ReturnType<DOMParser["parseFromString"]>;
type XMLElement = NonNullable<XMLDocument["documentElement"]>;

/** Decodes a document whose root must be a single `EntityDescriptor`. */
export function decodeEntityDescriptor(xml: string | Buffer): EntityDescriptor {
    const root = parseRoot(xml);
    expectRoot(root, "EntityDescriptor");
    return readEntityDescriptor(root);
}

/** Decodes a document whose root must be an `EntitiesDescriptor` collection. */
export function decodeEntitiesDescriptor(xml: string | Buffer): EntitiesDescriptor {
    const root = parseRoot(xml);
    expectRoot(root, "EntitiesDescriptor");
    return {
        name: root.getAttribute("Name"),
        entityDescriptors: childElements(root, "EntityDescriptor").map(readEntityDescriptor),
    };
}

/**
 * Resolves IdP metadata to exactly one entity. A single `EntityDescriptor`
 * is returned as is; for an `EntitiesDescriptor` the first member that
 * carries an `IDPSSODescriptor` is selected.
 */
export function parseIDPMetadata(xml: string | Buffer): EntityDescriptor {
    try {
        return decodeEntityDescriptor(xml);
    } catch (err) {
        if (!(err instanceof UnexpectedElementError) || !isMetadataElement(err.actual, "EntitiesDescriptor")) {
            throw err;
        }
    }

    const entities = decodeEntitiesDescriptor(xml);
    const idp = entities.entityDescriptors.find((e) => e.idpSSODescriptors.length > 0);
    if (!idp) {
        throw new NoIDPEntityError();
    }
    return idp;
}

function parseRoot(xml: string | Buffer): XMLElement {
    const source = (Buffer.isBuffer(xml) ? xml.toString("utf-8") : xml).replace(/\r\n?/g, "\n");

    const problems: string[] = [];
    let doc: XMLDocument;
    try {
        doc = new DOMParser({
            ...PARSER_OPTIONS,
            onError: (level, message) => {
                if (level !== "warning") problems.push(message);
            },
        }).parseFromString(source, "text/xml");
    } catch (err) {
        throw new XMLDecodeError(`invalid metadata XML: ${errorMessage(err)}`, { cause: err });
    }

    if (problems.length > 0) {
        throw new XMLDecodeError(`invalid metadata XML: ${problems[0]}`);
    }
    const root = doc.documentElement;
    if (!root) {
        throw new XMLDecodeError("invalid metadata XML: missing root element");
    }
    return root;
}

function nameOf(el: XMLElement): ElementName {
    return { namespaceURI: el.namespaceURI || null, localName: el.localName || el.nodeName };
}

function isMetadataElement(name: ElementName, localName: string): boolean {
    return name.localName === localName &&
        (name.namespaceURI === METADATA_NS || !name.namespaceURI);
}

function expectRoot(root: XMLElement, localName: string): void {
    const actual = nameOf(root);
    if (!isMetadataElement(actual, localName)) {
        throw new UnexpectedElementError(localName, actual);
    }
}

/** Direct children of `parent` in the metadata namespace, in document order. */
function childElements(parent: XMLElement, localName: string): XMLElement[] {
    const found = parent.getElementsByTagNameNS("*", localName);
    const children: XMLElement[] = [];
    for (let i = 0; i < found.length; i++) {
        const el = found.item(i);
        if (el && el.parentNode === parent && isMetadataElement(nameOf(el), localName)) {
            children.push(el);
        }
    }
    return children;
}

function childText(parent: XMLElement, localName: string): string[] {
    return childElements(parent, localName)
        .map((el) => (el.textContent ?? "").trim())
        .filter((text) => text.length > 0);
}

function readEntityDescriptor(el: XMLElement): EntityDescriptor {
    const entityID = el.getAttribute("entityID");
    if (!entityID) {
        throw new XMLDecodeError("EntityDescriptor is missing the entityID attribute");
    }

    return {
        entityID,
        id: el.getAttribute("ID"),
        validUntil: readDate(el, "validUntil"),
        cacheDuration: el.getAttribute("cacheDuration"),
        idpSSODescriptors: childElements(el, "IDPSSODescriptor").map(readIDPSSODescriptor),
        spSSODescriptors: childElements(el, "SPSSODescriptor").map(readSPSSODescriptor),
        xml: el.toString(),
    };
}

function readIDPSSODescriptor(el: XMLElement): IDPSSODescriptor {
    return {
        protocolSupportEnumeration: el.getAttribute("protocolSupportEnumeration") ?? "",
        wantAuthnRequestsSigned: readBoolean(el, "WantAuthnRequestsSigned"),
        keyDescriptors: childElements(el, "KeyDescriptor").map(readKeyDescriptor),
        nameIDFormats: childText(el, "NameIDFormat"),
        singleSignOnServices: childElements(el, "SingleSignOnService").map(readEndpoint),
        singleLogoutServices: childElements(el, "SingleLogoutService").map(readEndpoint),
    };
}

function readSPSSODescriptor(el: XMLElement): SPSSODescriptor {
    return {
        protocolSupportEnumeration: el.getAttribute("protocolSupportEnumeration") ?? "",
        authnRequestsSigned: readBoolean(el, "AuthnRequestsSigned"),
        wantAssertionsSigned: readBoolean(el, "WantAssertionsSigned"),
        keyDescriptors: childElements(el, "KeyDescriptor").map(readKeyDescriptor),
        nameIDFormats: childText(el, "NameIDFormat"),
        singleLogoutServices: childElements(el, "SingleLogoutService").map(readEndpoint),
        assertionConsumerServices: childElements(el, "AssertionConsumerService").map(readIndexedEndpoint),
    };
}

function readKeyDescriptor(el: XMLElement): KeyDescriptor {
    const use = el.getAttribute("use");
    if (use !== null && use !== "signing" && use !== "encryption") {
        throw new XMLDecodeError(`KeyDescriptor has an invalid use "${use}"`);
    }

    const certificates: string[] = [];
    const certNodes = el.getElementsByTagNameNS("*", "X509Certificate");
    for (let i = 0; i < certNodes.length; i++) {
        const body = (certNodes.item(i)?.textContent ?? "").replace(/\s+/g, "");
        if (body) certificates.push(body);
    }

    return { use, certificates };
}

function readEndpoint(el: XMLElement): Endpoint {
    return {
        binding: el.getAttribute("Binding") ?? "",
        location: el.getAttribute("Location") ?? "",
        responseLocation: el.getAttribute("ResponseLocation"),
    };
}

function readIndexedEndpoint(el: XMLElement): IndexedEndpoint {
    return { ...readEndpoint(el), index: readIndex(el), isDefault: readBoolean(el, "isDefault") };
}

function readIndex(el: XMLElement): number | null {
    const raw = el.getAttribute("index");
    if (raw === null) return null;
    const index = Number(raw);
    if (!/^\d+$/.test(raw) || !Number.isSafeInteger(index)) {
        throw new XMLDecodeError(`${nameOf(el).localName} has an invalid index "${raw}"`);
    }
    return index;
}

function readBoolean(el: XMLElement, attr: string): boolean | null {
    const raw = el.getAttribute(attr);
    switch (raw) {
        case null:
            return null;
        case "true":
        case "1":
            return true;
        case "false":
        case "0":
            return false;
        default:
            throw new XMLDecodeError(`attribute ${attr} is not a boolean: "${raw}"`);
    }
}

function readDate(el: XMLElement, attr: string): Date | null {
    const raw = el.getAttribute(attr);
    if (raw === null) return null;
    const date = new Date(raw);
    if (Number.isNaN(date.getTime())) {
        throw new XMLDecodeError(`attribute ${attr} is not a valid dateTime: "${raw}"`);
    }
    return date;
}
