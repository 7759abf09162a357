/**
 * Amazon ItemLookup client
 *
 * One lookup = sign the request, GET it through the transport, normalize a
 * 200 response. Credentials are copied and frozen at construction.
 */

import { createLogger } from '../../utils/logger';
import { signLookup } from './auth';
import { TransportError } from './errors';
import { emptyItem, parseItemLookupResponse } from './item-lookup';
import type { LookupCredentials, NormalizedItem, SignedRequest } from './types';

const logger = createLogger('amazon');

const DEFAULT_TIMEOUT_MS = 30_000;

export interface HttpResponse {
  status: number;
  body: string;
}

/** Performs the network call. Timeouts and cancellation are its own business. */
export type HttpTransport = (url: string, init: { method: 'GET' }) => Promise<HttpResponse>;

export interface ItemLookupClientOptions {
  /** Defaults to a fetch-based transport */
  transport?: HttpTransport;
  /** Service host (default: webservices.amazon.com) */
  host?: string;
  now?: () => Date;
  /**
   * What a non-200 response turns into: an empty record (default) or a
   * TransportError carrying the status.
   */
  onHttpError?: 'empty' | 'throw';
  /** Per-request timeout of the default transport (default: 30000) */
  timeoutMs?: number;
}

export interface ItemLookupClient {
  signLookup(itemId: string): SignedRequest;
  getItemInfo(itemId: string): Promise<NormalizedItem>;
}

export function createFetchTransport(timeoutMs: number = DEFAULT_TIMEOUT_MS): HttpTransport {
  return async (url, init) => {
    const response = await fetch(url, {
      method: init.method,
      signal: AbortSignal.timeout(timeoutMs),
    });
    return { status: response.status, body: await response.text() };
  };
}

export function createItemLookupClient(
  credentials: LookupCredentials,
  options: ItemLookupClientOptions = {},
): ItemLookupClient {
  const held: LookupCredentials = Object.freeze({
    accessKeyId: credentials.accessKeyId,
    secretAccessKey: Buffer.isBuffer(credentials.secretAccessKey)
      ? Buffer.from(credentials.secretAccessKey)
      : credentials.secretAccessKey,
    partnerTag: credentials.partnerTag,
  });
  const transport = options.transport ?? createFetchTransport(options.timeoutMs);
  const onHttpError = options.onHttpError ?? 'empty';

  function sign(itemId: string): SignedRequest {
    return signLookup(itemId, held, { host: options.host, now: options.now });
  }

  return {
    signLookup: sign,

    async getItemInfo(itemId: string): Promise<NormalizedItem> {
      const request = sign(itemId);

      logger.info({ itemId }, 'Looking up Amazon item');

      const response = await transport(request.url, { method: 'GET' });

      if (response.status !== 200) {
        const errorText = response.body.slice(0, 200);
        logger.warn({ itemId, status: response.status, errorText }, 'ItemLookup request failed');
        if (onHttpError === 'throw') {
          throw new TransportError(`Amazon ItemLookup failed (${response.status})`, response.status);
        }
        return emptyItem();
      }

      return parseItemLookupResponse(response.body);
    },
  };
}
