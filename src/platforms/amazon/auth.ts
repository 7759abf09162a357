/**
 * Amazon Product Advertising API - signed ItemLookup request URLs
 *
 * The legacy XML API authenticates a GET request by an HMAC-SHA256 signature
 * over the canonical query string. The service recomputes the signature from
 * the query it receives, so the canonical form below has to match its rules
 * exactly:
 *
 *   1. parameters sorted by name in byte order
 *   2. names and values form-urlencoded once
 *   3. string to sign = "GET\n<host>\n<path>\n<canonical query>"
 *   4. signature = percent-encoded base64(HMAC-SHA256(secret, string to sign))
 */

import * as crypto from 'crypto';
import { createLogger } from '../../utils/logger';
import { ConfigurationError, RequestEncodingError } from './errors';
import type { LookupCredentials, QueryParameters, SignedRequest } from './types';

const logger = createLogger('amazon-auth');

const SERVICE = 'AWSECommerceService';
const OPERATION = 'ItemLookup';
const API_VERSION = '2013-08-01';
const RESPONSE_GROUPS = ['EditorialReview', 'Images', 'ItemAttributes', 'OfferSummary', 'SalesRank'];

const SCHEME = 'http';
export const DEFAULT_HOST = 'webservices.amazon.com';
export const REQUEST_PATH = '/onca/xml';

export const MARKETPLACES = ['US', 'UK', 'DE', 'FR', 'JP', 'CA', 'IT', 'ES', 'IN', 'BR', 'MX', 'CN'] as const;

export type Marketplace = (typeof MARKETPLACES)[number];

/**
 * Service host per marketplace.
 */
export const MARKETPLACE_HOSTS: Record<Marketplace, string> = {
  US: DEFAULT_HOST,
  UK: 'webservices.amazon.co.uk',
  DE: 'webservices.amazon.de',
  FR: 'webservices.amazon.fr',
  JP: 'webservices.amazon.co.jp',
  CA: 'webservices.amazon.ca',
  IT: 'webservices.amazon.it',
  ES: 'webservices.amazon.es',
  IN: 'webservices.amazon.in',
  BR: 'webservices.amazon.com.br',
  MX: 'webservices.amazon.com.mx',
  CN: 'webservices.amazon.cn',
};

export interface SigningOptions {
  /** Service host (default: webservices.amazon.com) */
  host?: string;
  /** Clock used for the Timestamp parameter */
  now?: () => Date;
}

/**
 * Form-urlencode a query component: letters, digits and `_ . - ~` pass
 * through, space becomes `+`, everything else becomes uppercase `%XX` of its
 * UTF-8 bytes. Throws RequestEncodingError for a string with a lone surrogate.
 */
export function encodeQueryComponent(value: string): string {
  let encoded: string;
  try {
    encoded = encodeURIComponent(value);
  } catch (err) {
    if (!(err instanceof URIError)) throw err;
    throw new RequestEncodingError(`Cannot encode query value ${JSON.stringify(value)}: ${err.message}`, value);
  }
  return encoded
    .replace(/[!'()*]/g, (ch) => '%' + ch.charCodeAt(0).toString(16).toUpperCase())
    .replace(/%20/g, '+');
}

/** Ordinal comparison. `localeCompare` would put `AssociateTag` before `AWSAccessKeyId`. */
function compareOrdinal(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

export function canonicalizeQuery(params: QueryParameters): string {
  return Object.entries(params)
    .sort(([a], [b]) => compareOrdinal(a, b))
    .map(([key, value]) => `${encodeQueryComponent(key)}=${encodeQueryComponent(value)}`)
    .join('&');
}

/** `YYYY-MM-DDTHH:MM:SSZ` in UTC */
export function formatTimestamp(date: Date): string {
  return date.toISOString().replace(/\.\d{3}Z$/, 'Z');
}

export function buildLookupParameters(
  itemId: string,
  credentials: LookupCredentials,
  timestamp: string,
): QueryParameters {
  return {
    Service: SERVICE,
    Operation: OPERATION,
    AWSAccessKeyId: credentials.accessKeyId,
    ResponseGroup: RESPONSE_GROUPS.join(','),
    ItemId: itemId,
    AssociateTag: credentials.partnerTag,
    Version: API_VERSION,
    Timestamp: timestamp,
  };
}

export function buildStringToSign(host: string, canonicalQuery: string): string {
  return ['GET', host, REQUEST_PATH, canonicalQuery].join('\n');
}

/**
 * HMAC-SHA256 over the string to sign, base64-encoded, then percent-encoded
 * so `+`, `/` and `=` survive in the query string.
 */
export function computeSignature(stringToSign: string, secretKey: string | Buffer): string {
  const digest = crypto.createHmac('sha256', secretKey).update(stringToSign, 'utf8').digest('base64');
  return encodeQueryComponent(digest);
}

function isBlank(value: string | Buffer | undefined): boolean {
  if (value === undefined) return true;
  return typeof value === 'string' ? value.trim().length === 0 : value.length === 0;
}

function assertCredentials(credentials: LookupCredentials): void {
  const fields: Array<[keyof LookupCredentials, string | Buffer | undefined]> = [
    ['accessKeyId', credentials.accessKeyId],
    ['secretAccessKey', credentials.secretAccessKey],
    ['partnerTag', credentials.partnerTag],
  ];
  const missing = fields.filter(([, value]) => isBlank(value)).map(([name]) => name);
  if (missing.length > 0) {
    throw new ConfigurationError(`Missing Amazon credentials: ${missing.join(', ')}`, missing);
  }
}

/**
 * Build a signed ItemLookup URL for one item.
 *
 * The item id and partner tag are sent as given; the service validates them.
 */
export function signLookup(
  itemId: string,
  credentials: LookupCredentials,
  options: SigningOptions = {},
): SignedRequest {
  assertCredentials(credentials);

  const host = options.host ?? DEFAULT_HOST;
  const timestamp = formatTimestamp((options.now ?? (() => new Date()))());

  const canonicalQuery = canonicalizeQuery(buildLookupParameters(itemId, credentials, timestamp));
  const stringToSign = buildStringToSign(host, canonicalQuery);
  const signature = computeSignature(stringToSign, credentials.secretAccessKey);

  logger.debug({ itemId, host, timestamp }, 'Signed ItemLookup request');

  return {
    url: `${SCHEME}://${host}${REQUEST_PATH}?${canonicalQuery}&Signature=${signature}`,
    timestamp,
    canonicalQuery,
    stringToSign,
    signature,
  };
}
