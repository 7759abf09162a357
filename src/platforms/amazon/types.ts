/**
 * Amazon Product Advertising API (XML ItemLookup) types
 */

export interface LookupCredentials {
  readonly accessKeyId: string;
  /** Raw HMAC key; a string is used as its UTF-8 bytes */
  readonly secretAccessKey: string | Buffer;
  /** Associates partner tag, sent as `AssociateTag` */
  readonly partnerTag: string;
}

/** Query parameter name -> value. Ordering is applied at canonicalization. */
export type QueryParameters = Record<string, string>;

export interface SignedRequest {
  /** Ready-to-use GET target, signature included */
  readonly url: string;
  readonly timestamp: string;
  readonly canonicalQuery: string;
  readonly stringToSign: string;
  /** Base64 HMAC-SHA256, already percent-encoded */
  readonly signature: string;
}

// ---------------------------------------------------------------------------
// Normalized response
// ---------------------------------------------------------------------------

/** Each entry is `"<value> (<unit>)"`, or `''` when the source omits it */
export interface ItemDimensions {
  height: string;
  length: string;
  weight: string;
  width: string;
}

export interface ItemAttributes {
  title: string;
  manufacturer: string;
  model: string;
  size: string;
  warranty: string;
  itemDimensions: ItemDimensions;
  features: string[];
}

/** Height and width are pixel counts, copied as text */
export interface ImageInfo {
  height: string;
  width: string;
  url: string;
}

export interface ItemImages {
  small: ImageInfo;
  medium: ImageInfo;
  large: ImageInfo;
}

export interface NormalizedItem {
  itemAttributes: ItemAttributes;
  /** Product detail page */
  url: string;
  images: ItemImages;
  salesRank: string;
  /** Lowest new price, formatted by the service (currency included) */
  price: string;
  description: string;
}
