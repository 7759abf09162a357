/**
 * ItemLookup response normalization
 *
 * Maps the XML ItemLookupResponse onto a fixed-shape NormalizedItem. Every
 * optional element may be missing; missing fields keep their defaults.
 */

import { createLogger } from '../../utils/logger';
import { ResponseParseError, UpstreamError } from './errors';
import type { ImageInfo, ItemAttributes, ItemDimensions, NormalizedItem } from './types';
import {
  attributeOf,
  findElement,
  findElements,
  parseXmlDocument,
  textAt,
  textOf,
  type XmlElement,
} from './xml';

const logger = createLogger('amazon-item-lookup');

const ROOT_ELEMENT = 'ItemLookupResponse';
const INVALID_LOOKUP_MESSAGE = 'Invalid item lookup';

function emptyImage(): ImageInfo {
  return { height: '', width: '', url: '' };
}

/** A record with every field at its default */
export function emptyItem(): NormalizedItem {
  return {
    itemAttributes: {
      title: '',
      manufacturer: '',
      model: '',
      size: '',
      warranty: '',
      itemDimensions: { height: '', length: '', weight: '', width: '' },
      features: [],
    },
    url: '',
    images: { small: emptyImage(), medium: emptyImage(), large: emptyImage() },
    salesRank: '',
    price: '',
    description: '',
  };
}

export function isEmptyItem(item: NormalizedItem): boolean {
  const attrs = item.itemAttributes;
  const values = [
    attrs.title,
    attrs.manufacturer,
    attrs.model,
    attrs.size,
    attrs.warranty,
    ...Object.values(attrs.itemDimensions),
    ...Object.values(item.images).flatMap((image) => Object.values(image)),
    item.url,
    item.salesRank,
    item.price,
    item.description,
  ];
  return attrs.features.length === 0 && values.every((value) => value === '');
}

/**
 * Raise UpstreamError when the request echo says `IsValid` = False.
 */
function assertValidRequest(root: XmlElement): void {
  const isValid = textAt(root, 'Items/Request/IsValid');
  if (isValid.trim().toLowerCase() !== 'false') return;

  const message = textAt(root, 'Items/Request/Errors/Error/Message') || INVALID_LOOKUP_MESSAGE;
  const code = textAt(root, 'Items/Request/Errors/Error/Code') || undefined;
  logger.warn({ code, message }, 'ItemLookup request rejected');
  throw new UpstreamError(message, code);
}

/** `"<value> (<unit>)"`; just the value when the element has no Units */
function readDimension(dimensions: XmlElement, name: string): string {
  const element = findElement(dimensions, name);
  if (!element) return '';
  const unit = attributeOf(element, 'Units');
  const value = textOf(element);
  return unit ? `${value} (${unit})` : value;
}

function readDimensions(item: XmlElement): ItemDimensions {
  const dimensions = findElement(item, 'ItemAttributes/ItemDimensions');
  if (!dimensions) return { height: '', length: '', weight: '', width: '' };
  return {
    height: readDimension(dimensions, 'Height'),
    length: readDimension(dimensions, 'Length'),
    weight: readDimension(dimensions, 'Weight'),
    width: readDimension(dimensions, 'Width'),
  };
}

function readAttributes(item: XmlElement): ItemAttributes {
  return {
    title: textAt(item, 'ItemAttributes/Title'),
    manufacturer: textAt(item, 'ItemAttributes/Manufacturer'),
    model: textAt(item, 'ItemAttributes/Model'),
    size: textAt(item, 'ItemAttributes/Size'),
    warranty: textAt(item, 'ItemAttributes/Warranty'),
    itemDimensions: readDimensions(item),
    features: findElements(item, 'ItemAttributes/Feature').map(textOf),
  };
}

/** Content of the first EditorialReview only, even when a later one has it */
function readDescription(item: XmlElement): string {
  const firstReview = findElement(item, 'EditorialReviews/EditorialReview');
  return firstReview ? textAt(firstReview, 'Content') : '';
}

function readImage(item: XmlElement, name: string): ImageInfo {
  const image = findElement(item, name);
  if (!image) return emptyImage();
  return {
    height: textAt(image, 'Height'),
    width: textAt(image, 'Width'),
    url: textAt(image, 'URL'),
  };
}

/**
 * Normalize a parsed ItemLookupResponse.
 *
 * Throws UpstreamError for a rejected request and ResponseParseError when the
 * root is not an ItemLookupResponse. A valid response without an Item yields
 * `emptyItem()`.
 */
export function normalizeItemLookup(root: XmlElement): NormalizedItem {
  if (root.name !== ROOT_ELEMENT) {
    throw new ResponseParseError(`Expected <${ROOT_ELEMENT}> but found <${root.name}>`);
  }

  assertValidRequest(root);

  const item = findElement(root, 'Items/Item');
  if (!item) {
    logger.debug('ItemLookup response has no Item');
    return emptyItem();
  }

  return {
    itemAttributes: readAttributes(item),
    url: textAt(item, 'DetailPageURL'),
    images: {
      small: readImage(item, 'SmallImage'),
      medium: readImage(item, 'MediumImage'),
      large: readImage(item, 'LargeImage'),
    },
    salesRank: textAt(item, 'SalesRank'),
    // Used, collectible and refurbished offers are ignored
    price: textAt(item, 'OfferSummary/LowestNewPrice/FormattedPrice'),
    description: readDescription(item),
  };
}

export function parseItemLookupResponse(body: string | Buffer): NormalizedItem {
  return normalizeItemLookup(parseXmlDocument(body));
}
