import type { NormalizedItem } from '../platforms/amazon/types';

/** Title, price and feature bullets, one per line */
export function formatItemSummary(item: NormalizedItem): string {
  const lines = [
    `Title: ${item.itemAttributes.title}`,
    `Price: ${item.price}`,
    'Features:',
    ...item.itemAttributes.features.map((feature) => ` - ${feature}`),
  ];
  return lines.join('\n');
}
