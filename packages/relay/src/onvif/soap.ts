import { createHash, randomBytes } from "node:crypto";
import { XMLParser } from "fast-xml-parser";
import { HttpStatusError, requestWithRetry } from "@camrelay/shared";

export const NS = {
  soap: "http://www.w3.org/2003/05/soap-envelope",
  wsa: "http://www.w3.org/2005/08/addressing",
  wsse: "http://docs.oasis-open.org/wss/2004/01/oasis-200401-wss-wssecurity-secext-1.0.xsd",
  wsu: "http://docs.oasis-open.org/wss/2004/01/oasis-200401-wss-wssecurity-utility-1.0.xsd",
  tds: "http://www.onvif.org/ver10/device/wsdl",
  tev: "http://www.onvif.org/ver10/events/wsdl",
  wsnt: "http://docs.oasis-open.org/wsn/b-2",
  tns1: "http://www.onvif.org/ver10/topics"
} as const;

const PASSWORD_DIGEST =
  "http://docs.oasis-open.org/wss/2004/01/oasis-200401-wss-username-token-profile-1.0#PasswordDigest";
const BASE64_BINARY =
  "http://docs.oasis-open.org/wss/2004/01/oasis-200401-wss-soap-message-security-1.0#Base64Binary";

export interface SoapCredentials {
  username: string;
  password: string;
}

export interface UsernameToken {
  username: string;
  digest: string;
  nonce: string;
  created: string;
}

export function escapeXml(value: string): string {
  return value
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&apos;");
}

/** PasswordDigest = base64(sha1(nonce + created + password)). */
export function createUsernameToken(
  credentials: SoapCredentials,
  createdMs: number,
  nonce: Buffer = randomBytes(16)
): UsernameToken {
  const created = new Date(createdMs).toISOString().replace(/\.\d{3}Z$/, "Z");
  const digest = createHash("sha1")
    .update(Buffer.concat([nonce, Buffer.from(created, "utf8"), Buffer.from(credentials.password, "utf8")]))
    .digest("base64");
  return {
    username: credentials.username,
    digest,
    nonce: nonce.toString("base64"),
    created
  };
}

function securityHeader(token: UsernameToken): string {
  return `<wsse:Security s:mustUnderstand="1" xmlns:wsse="${NS.wsse}" xmlns:wsu="${NS.wsu}">
      <wsse:UsernameToken>
        <wsse:Username>${escapeXml(token.username)}</wsse:Username>
        <wsse:Password Type="${PASSWORD_DIGEST}">${token.digest}</wsse:Password>
        <wsse:Nonce EncodingType="${BASE64_BINARY}">${token.nonce}</wsse:Nonce>
        <wsu:Created>${token.created}</wsu:Created>
      </wsse:UsernameToken>
    </wsse:Security>`;
}

function addressingHeader(action: string, to: string): string {
  return `<wsa:Action s:mustUnderstand="1" xmlns:wsa="${NS.wsa}">${escapeXml(action)}</wsa:Action>
    <wsa:To s:mustUnderstand="1" xmlns:wsa="${NS.wsa}">${escapeXml(to)}</wsa:To>`;
}

export function buildEnvelope(args: {
  body: string;
  token?: UsernameToken;
  addressing?: { action: string; to: string };
}): string {
  const headers = [
    args.token ? securityHeader(args.token) : "",
    args.addressing ? addressingHeader(args.addressing.action, args.addressing.to) : ""
  ].filter((part) => part.length > 0);

  return `<?xml version="1.0" encoding="UTF-8"?>
<s:Envelope xmlns:s="${NS.soap}">
  <s:Header>
    ${headers.join("\n    ")}
  </s:Header>
  <s:Body>
    ${args.body}
  </s:Body>
</s:Envelope>`;
}

const parser = new XMLParser({
  ignoreAttributes: false,
  attributeNamePrefix: "@_",
  removeNSPrefix: true,
  parseTagValue: false,
  parseAttributeValue: false,
  trimValues: true,
  isArray: (name) => name === "NotificationMessage" || name === "SimpleItem"
});

export type XmlNode = Record<string, unknown>;

export function isNode(value: unknown): value is XmlNode {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function child(node: unknown, ...path: string[]): unknown {
  let current: unknown = node;
  for (const key of path) {
    if (!isNode(current)) {
      return undefined;
    }
    current = current[key];
  }
  return current;
}

export function children(node: unknown, key: string): unknown[] {
  const value = child(node, key);
  if (value === undefined) {
    return [];
  }
  return Array.isArray(value) ? value : [value];
}

/** Text content of an element whether or not the parser kept it as an object with attributes. */
export function text(node: unknown): string | undefined {
  if (typeof node === "string") {
    return node;
  }
  if (typeof node === "number" || typeof node === "boolean") {
    return String(node);
  }
  if (isNode(node)) {
    return text(node["#text"]);
  }
  return undefined;
}

export function attr(node: unknown, name: string): string | undefined {
  return text(child(node, `@_${name}`));
}

export class SoapFault extends Error {
  constructor(
    readonly reason: string,
    readonly status?: number
  ) {
    super(`SOAP fault: ${reason}`);
    this.name = "SoapFault";
  }
}

function readFault(body: unknown): string | undefined {
  const fault = child(body, "Fault");
  if (fault === undefined) {
    return undefined;
  }
  const reason =
    text(child(fault, "Reason", "Text")) ??
    text(child(fault, "faultstring")) ??
    text(child(fault, "Code", "Subcode", "Value")) ??
    text(child(fault, "Code", "Value"));
  return reason ?? "unknown fault";
}

/** Parses a SOAP response and returns its Body, raising {@link SoapFault} on a Fault element. */
export function parseSoapBody(xml: string): XmlNode {
  let document: unknown;
  try {
    document = parser.parse(xml);
  } catch (error) {
    throw new SoapFault(`malformed response: ${error instanceof Error ? error.message : String(error)}`);
  }
  const body = child(document, "Envelope", "Body");
  if (!isNode(body)) {
    throw new SoapFault("response has no SOAP body");
  }
  const fault = readFault(body);
  if (fault) {
    throw new SoapFault(fault);
  }
  return body;
}

export interface SoapCallOptions {
  url: string;
  action: string;
  body: string;
  token?: UsernameToken;
  addressing?: boolean;
  timeoutMs: number;
  signal?: AbortSignal;
}

export async function soapCall(options: SoapCallOptions): Promise<XmlNode> {
  const envelope = buildEnvelope({
    body: options.body,
    token: options.token,
    addressing: options.addressing ? { action: options.action, to: options.url } : undefined
  });

  let response: Response;
  try {
    response = await requestWithRetry(options.url, {
      method: "POST",
      headers: {
        "content-type": `application/soap+xml; charset=utf-8; action="${options.action}"`
      },
      body: envelope,
      signal: options.signal
    }, {
      timeoutMs: options.timeoutMs,
      retries: 0,
      backoffMs: 0
    });
  } catch (error) {
    // cameras answer faults with HTTP 400/500 and a SOAP body
    if (error instanceof HttpStatusError && error.body.includes("Envelope")) {
      let reason = `HTTP ${error.status}`;
      try {
        parseSoapBody(error.body);
      } catch (fault) {
        if (fault instanceof SoapFault) {
          reason = fault.reason;
        }
      }
      throw new SoapFault(reason, error.status);
    }
    throw error;
  }

  return parseSoapBody(await response.text());
}
