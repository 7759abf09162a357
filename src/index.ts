/**
 * catalog-lookup — signed Amazon ItemLookup requests and normalized results
 */

export {
  signLookup,
  encodeQueryComponent,
  canonicalizeQuery,
  buildLookupParameters,
  buildStringToSign,
  computeSignature,
  formatTimestamp,
  DEFAULT_HOST,
  REQUEST_PATH,
  MARKETPLACES,
  MARKETPLACE_HOSTS,
  type Marketplace,
  type SigningOptions,
} from './platforms/amazon/auth';
export {
  createItemLookupClient,
  createFetchTransport,
  type HttpResponse,
  type HttpTransport,
  type ItemLookupClient,
  type ItemLookupClientOptions,
} from './platforms/amazon/client';
export {
  LookupError,
  ConfigurationError,
  UpstreamError,
  TransportError,
  ResponseParseError,
  RequestEncodingError,
} from './platforms/amazon/errors';
export {
  emptyItem,
  isEmptyItem,
  normalizeItemLookup,
  parseItemLookupResponse,
} from './platforms/amazon/item-lookup';
export {
  parseXmlDocument,
  childElements,
  findElement,
  findElements,
  textOf,
  textAt,
  attributeOf,
  type XmlElement,
  type XmlNode,
  type XmlText,
} from './platforms/amazon/xml';
export type {
  LookupCredentials,
  QueryParameters,
  SignedRequest,
  ItemDimensions,
  ItemAttributes,
  ImageInfo,
  ItemImages,
  NormalizedItem,
} from './platforms/amazon/types';
export { loadConfig, credentialsFrom, hostFor, type AppConfig } from './utils/config';
