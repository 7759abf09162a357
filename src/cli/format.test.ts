import { describe, it, expect } from 'vitest';
import { emptyItem } from '../platforms/amazon/item-lookup';
import { formatItemSummary } from './format';

describe('formatItemSummary', () => {
  it('prints title, price and one line per feature', () => {
    const item = emptyItem();
    item.itemAttributes.title = 'Test Cable';
    item.price = '$7.99';
    item.itemAttributes.features = ['Braided', '10 feet'];

    expect(formatItemSummary(item)).toBe('Title: Test Cable\nPrice: $7.99\nFeatures:\n - Braided\n - 10 feet');
  });

  it('prints an empty feature list as a bare heading', () => {
    expect(formatItemSummary(emptyItem())).toBe('Title: \nPrice: \nFeatures:');
  });
});
