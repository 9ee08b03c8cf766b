/**
 * XML codec for the Bulk API async REST surface and the partner SOAP login.
 */

import { XMLBuilder, XMLParser, XMLValidator } from 'fast-xml-parser';
import { ResponseParseError } from '../errors/index.js';

/** Namespace of every job/batch document */
export const JOB_NAMESPACE = 'http://www.force.com/2009/06/asyncapi/dataload';

export const XML_DECLARATION = '<?xml version="1.0" encoding="UTF-8"?>';

const PARSER_OPTIONS = {
  ignoreAttributes: true,
  removeNSPrefix: true,
  ignoreDeclaration: true,
  parseTagValue: false,
  trimValues: true,
};

const BUILDER_OPTIONS = {
  ignoreAttributes: false,
  attributeNamePrefix: '@_',
  format: false,
  suppressEmptyNode: true,
};

type XmlNode = Record<string, unknown>;

function isNode(value: unknown): value is XmlNode {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Normalizes array-or-single-item parsing behavior.
 */
export function normalizeArray<T>(value: T | T[] | undefined): T[] {
  if (value === undefined || value === null) {
    return [];
  }
  return Array.isArray(value) ? value : [value];
}

/**
 * Parses an XML document, validating it first.
 */
export function parseXml(xml: string): XmlNode {
  const validation = XMLValidator.validate(xml);
  if (validation !== true) {
    throw new ResponseParseError(`invalid XML (${validation.err.msg})`);
  }
  const parsed: unknown = new XMLParser(PARSER_OPTIONS).parse(xml);
  if (!isNode(parsed)) {
    throw new ResponseParseError('XML document has no root element');
  }
  return parsed;
}

/**
 * Returns the name and content of the single root element.
 */
function rootOf(doc: XmlNode): [string, unknown] {
  const entries = Object.entries(doc);
  if (entries.length === 0) {
    throw new ResponseParseError('XML document has no root element');
  }
  return entries[0];
}

/**
 * Walks element names from a node; undefined as soon as a step is missing.
 */
function descend(node: unknown, ...names: string[]): unknown {
  let current = node;
  for (const name of names) {
    if (!isNode(current)) return undefined;
    current = current[name];
  }
  return current;
}

function textOf(value: unknown): string | undefined {
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  return undefined;
}

/**
 * Flattens the root element's direct children into a field map.
 *
 * Namespace prefixes are dropped, empty elements map to "", nested elements
 * are skipped and a repeated element keeps its last value.
 */
export function parseFlatRecord(xml: string): Record<string, string> {
  const [, root] = rootOf(parseXml(xml));
  const record: Record<string, string> = {};
  if (!isNode(root)) {
    return record;
  }
  for (const [name, value] of Object.entries(root)) {
    if (name.startsWith('#')) continue;
    const values = normalizeArray(value);
    for (const item of values) {
      const text = textOf(item);
      if (text !== undefined) {
        record[name] = text;
      }
    }
  }
  return record;
}

/**
 * Extracts result segment ids from a result-list document, in document order.
 */
export function parseResultIds(xml: string): string[] {
  const [name, root] = rootOf(parseXml(xml));
  if (name !== 'result-list') {
    throw new ResponseParseError(`expected result-list document, got ${name}`);
  }
  const ids: string[] = [];
  for (const item of normalizeArray(descend(root, 'result'))) {
    const text = textOf(item);
    if (text !== undefined && text.length > 0) {
      ids.push(text);
    }
  }
  return ids;
}

/**
 * Builds a jobInfo document with one child element per field, in order.
 */
export function buildJobInfoDocument(fields: ReadonlyArray<readonly [string, string]>): string {
  const jobInfo: XmlNode = { '@_xmlns': JOB_NAMESPACE };
  for (const [name, value] of fields) {
    jobInfo[name] = value;
  }
  return XML_DECLARATION + new XMLBuilder(BUILDER_OPTIONS).build({ jobInfo });
}

/**
 * Remote exception carried by an error response.
 */
export interface BulkApiFault {
  exceptionCode?: string;
  exceptionMessage?: string;
}

/**
 * Reads exceptionCode/exceptionMessage from a Bulk API error document.
 * Returns undefined for bodies that are not such a document.
 */
export function parseBulkApiError(body: string): BulkApiFault | undefined {
  if (body.trim().length === 0 || XMLValidator.validate(body) !== true) {
    return undefined;
  }
  const [name, root] = rootOf(parseXml(body));
  if (name !== 'error') {
    return undefined;
  }
  return {
    exceptionCode: textOf(descend(root, 'exceptionCode')),
    exceptionMessage: textOf(descend(root, 'exceptionMessage')),
  };
}

// ============================================================================
// Partner SOAP login
// ============================================================================

const SOAP_ENVELOPE_NS = 'http://schemas.xmlsoap.org/soap/envelope/';
const PARTNER_NS = 'urn:partner.soap.sforce.com';

/**
 * Builds the partner API login envelope.
 */
export function buildLoginEnvelope(options: {
  username: string;
  password: string;
  clientName: string;
  organizationId?: string;
}): string {
  const header: XmlNode = {
    'urn:CallOptions': { 'urn:client': options.clientName },
  };
  if (options.organizationId) {
    header['urn:LoginScopeHeader'] = { 'urn:organizationId': options.organizationId };
  }

  const envelope = {
    'env:Envelope': {
      '@_xmlns:env': SOAP_ENVELOPE_NS,
      '@_xmlns:urn': PARTNER_NS,
      'env:Header': header,
      'env:Body': {
        'urn:login': {
          'urn:username': options.username,
          'urn:password': options.password,
        },
      },
    },
  };
  return XML_DECLARATION + new XMLBuilder(BUILDER_OPTIONS).build(envelope);
}

/**
 * Outcome of a partner API login call.
 */
export type LoginResponse =
  | { ok: true; sessionId: string; serverUrl: string }
  | { ok: false; faultCode: string; faultString: string };

/**
 * Parses a login response or SOAP fault.
 */
export function parseLoginResponse(xml: string): LoginResponse {
  const doc = parseXml(xml);
  const body = descend(doc, 'Envelope', 'Body');

  const fault = descend(body, 'Fault');
  if (fault !== undefined) {
    return {
      ok: false,
      faultCode: textOf(descend(fault, 'faultcode')) ?? 'UNKNOWN',
      faultString: textOf(descend(fault, 'faultstring')) ?? 'Unknown login fault',
    };
  }

  const result = descend(body, 'loginResponse', 'result');
  const sessionId = textOf(descend(result, 'sessionId'));
  const serverUrl = textOf(descend(result, 'serverUrl'));
  if (!sessionId || !serverUrl) {
    throw new ResponseParseError('login response is missing sessionId or serverUrl');
  }
  return { ok: true, sessionId, serverUrl };
}
