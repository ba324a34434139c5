import * as selfsigned from "selfsigned";
import { HTTPClient, HTTPRequest, HTTPResponse, Logger } from "../src";

export const MD_NS = "urn:oasis:names:tc:SAML:2.0:metadata";
export const REDIRECT = "urn:oasis:names:tc:SAML:2.0:bindings:HTTP-Redirect";
export const POST = "urn:oasis:names:tc:SAML:2.0:bindings:HTTP-POST";
export const CERT_BODY = "MIIBdGVzdC1jZXJ0aWZpY2F0ZS1ib2R5";

/** IdP EntityDescriptor element with a signing key and one SSO endpoint per binding. */
export function idpEntityXML(entityID: string, { declareNS = true } = {}): string {
    const ns = declareNS ? ` xmlns:md="${MD_NS}" xmlns:ds="http://www.w3.org/2000/09/xmldsig#"` : "";
    return `<md:EntityDescriptor${ns} entityID="${entityID}" validUntil="2030-01-01T00:00:00Z">
  <md:IDPSSODescriptor WantAuthnRequestsSigned="true" protocolSupportEnumeration="urn:oasis:names:tc:SAML:2.0:protocol">
    <md:KeyDescriptor use="signing">
      <ds:KeyInfo>
        <ds:X509Data>
          <ds:X509Certificate>
            ${CERT_BODY}
          </ds:X509Certificate>
        </ds:X509Data>
      </ds:KeyInfo>
    </md:KeyDescriptor>
    <md:NameIDFormat>urn:oasis:names:tc:SAML:1.1:nameid-format:emailAddress</md:NameIDFormat>
    <md:SingleSignOnService Binding="${REDIRECT}" Location="${entityID}/sso"/>
    <md:SingleSignOnService Binding="${POST}" Location="${entityID}/sso/post"/>
    <md:SingleLogoutService Binding="${REDIRECT}" Location="${entityID}/slo"/>
  </md:IDPSSODescriptor>
</md:EntityDescriptor>`;
}

/** SP-only EntityDescriptor element; carries no IDPSSODescriptor. */
export function spEntityXML(entityID: string, { declareNS = true } = {}): string {
    const ns = declareNS ? ` xmlns:md="${MD_NS}"` : "";
    return `<md:EntityDescriptor${ns} entityID="${entityID}">
  <md:SPSSODescriptor AuthnRequestsSigned="false" WantAssertionsSigned="1" protocolSupportEnumeration="urn:oasis:names:tc:SAML:2.0:protocol">
    <md:AssertionConsumerService Binding="${POST}" Location="${entityID}/acs" index="0" isDefault="true"/>
    <md:AssertionConsumerService Binding="${REDIRECT}" Location="${entityID}/acs/redirect" index="1"/>
  </md:SPSSODescriptor>
</md:EntityDescriptor>`;
}

export function entitiesXML(...members: string[]): string {
    return `<?xml version="1.0" encoding="UTF-8"?>
<md:EntitiesDescriptor xmlns:md="${MD_NS}" xmlns:ds="http://www.w3.org/2000/09/xmldsig#" Name="federation">
${members.join("\n")}
</md:EntitiesDescriptor>`;
}

export interface KeyPair {
    privateKey: string;
    certificate: string;
}

/** Self-signed SP key material. */
export function generateKeys(keySize: 2048 | 4096 = 2048): KeyPair {
    const result = selfsigned.generate([{ name: "commonName", value: "sp.example.com" }], {
        keySize,
        algorithm: "sha256",
    });
    return { privateKey: result.private, certificate: result.cert };
}

export function mockLogger(): jest.Mocked<Logger> {
    return {
        debug: jest.fn(),
        info: jest.fn(),
        warn: jest.fn(),
        error: jest.fn(),
    };
}

export type Reply = HTTPResponse | Error;

/** HTTP client that answers each call with the next reply, repeating the last one. */
export function scriptedClient(...replies: Reply[]): HTTPClient & {
    get: jest.Mock<Promise<HTTPResponse>, [string, HTTPRequest]>;
} {
    let calls = 0;
    const get = jest.fn(async (_url: string, _request: HTTPRequest): Promise<HTTPResponse> => {
        const reply = replies[Math.min(calls, replies.length - 1)];
        calls++;
        if (reply instanceof Error) throw reply;
        return reply;
    });
    return { get };
}

export function ok(data: string): HTTPResponse {
    return { status: 200, statusText: "OK", data };
}
