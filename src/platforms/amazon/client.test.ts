import { describe, it, expect, vi } from 'vitest';
import { createItemLookupClient, type HttpTransport } from './client';
import { ConfigurationError, TransportError, UpstreamError } from './errors';
import { emptyItem } from './item-lookup';
import type { LookupCredentials } from './types';

// =============================================================================
// Helpers
// =============================================================================

const credentials: LookupCredentials = {
  accessKeyId: 'AKIDEXAMPLE',
  secretAccessKey: 'test-secret',
  partnerTag: 'test-20',
};

const fixedNow = () => new Date(Date.UTC(2018, 5, 24, 13, 1, 10));

const ITEM_BODY = `<ItemLookupResponse>
  <Items>
    <Request><IsValid>True</IsValid></Request>
    <Item>
      <ItemAttributes><Title>Test Cable</Title><Feature>Braided</Feature></ItemAttributes>
      <OfferSummary><LowestNewPrice><FormattedPrice>$7.99</FormattedPrice></LowestNewPrice></OfferSummary>
    </Item>
  </Items>
</ItemLookupResponse>`;

function createMockTransport(status: number, body: string) {
  return vi.fn().mockResolvedValue({ status, body });
}

// =============================================================================
// Tests
// =============================================================================

describe('createItemLookupClient', () => {
  it('sends the signed URL with GET and normalizes a 200 response', async () => {
    const transport = createMockTransport(200, ITEM_BODY);
    const client = createItemLookupClient(credentials, { transport, now: fixedNow });

    const item = await client.getItemInfo('B000TEST01');

    expect(transport).toHaveBeenCalledTimes(1);
    expect(transport).toHaveBeenCalledWith(client.signLookup('B000TEST01').url, { method: 'GET' });
    expect(item.itemAttributes.title).toBe('Test Cable');
    expect(item.itemAttributes.features).toEqual(['Braided']);
    expect(item.price).toBe('$7.99');
  });

  it('returns an empty record for a non-200 response', async () => {
    const transport = createMockTransport(503, 'Service Unavailable');
    const client = createItemLookupClient(credentials, { transport, now: fixedNow });

    await expect(client.getItemInfo('B000TEST01')).resolves.toEqual(emptyItem());
  });

  it('throws TransportError for a non-200 response when asked to', async () => {
    const transport = createMockTransport(403, '<ItemLookupErrorResponse/>');
    const client = createItemLookupClient(credentials, { transport, now: fixedNow, onHttpError: 'throw' });

    const error = await client.getItemInfo('B000TEST01').catch((err: unknown) => err);

    expect(error).toBeInstanceOf(TransportError);
    expect(error instanceof TransportError && error.statusCode).toBe(403);
  });

  it('surfaces UpstreamError from an invalid request', async () => {
    const body = `<ItemLookupResponse><Items><Request><IsValid>False</IsValid>
      <Errors><Error><Message>Item not found</Message></Error></Errors></Request></Items></ItemLookupResponse>`;
    const client = createItemLookupClient(credentials, { transport: createMockTransport(200, body) });

    await expect(client.getItemInfo('B000MISSING')).rejects.toThrow(new UpstreamError('Item not found'));
  });

  it('propagates transport failures', async () => {
    const transport: HttpTransport = vi.fn().mockRejectedValue(new Error('socket hang up'));
    const client = createItemLookupClient(credentials, { transport });

    await expect(client.getItemInfo('B000TEST01')).rejects.toThrow('socket hang up');
  });

  it('fails with ConfigurationError before calling the transport', async () => {
    const transport = createMockTransport(200, ITEM_BODY);
    const client = createItemLookupClient({ ...credentials, partnerTag: '' }, { transport });

    await expect(client.getItemInfo('B000TEST01')).rejects.toBeInstanceOf(ConfigurationError);
    expect(transport).not.toHaveBeenCalled();
  });

  it('signs against the configured host', () => {
    const client = createItemLookupClient(credentials, {
      transport: createMockTransport(200, ITEM_BODY),
      host: 'webservices.amazon.de',
      now: fixedNow,
    });

    expect(client.signLookup('B000TEST01').url.startsWith('http://webservices.amazon.de/onca/xml?')).toBe(true);
  });

  it('keeps its own copy of the credentials', () => {
    const mutable = { accessKeyId: 'AKIDEXAMPLE', secretAccessKey: 'test-secret', partnerTag: 'test-20' };
    const client = createItemLookupClient(mutable, { transport: createMockTransport(200, ITEM_BODY), now: fixedNow });
    const before = client.signLookup('B000TEST01').url;

    mutable.partnerTag = 'other-20';

    expect(client.signLookup('B000TEST01').url).toBe(before);
  });
});
