#!/usr/bin/env node
/**
 * catalog-lookup CLI
 *
 * Commands:
 * - catalog-lookup lookup [itemIds...]  — Look up items (prompts when no ids are given)
 * - catalog-lookup sign <itemId>        — Print the signed request URL
 */

import { config as dotenvConfig } from 'dotenv';

// Load .env before the logger reads LOG_LEVEL
dotenvConfig();

import { Command } from 'commander';
import { createItemLookupClient, type ItemLookupClient } from '../platforms/amazon/client';
import { LookupError } from '../platforms/amazon/errors';
import { isEmptyItem } from '../platforms/amazon/item-lookup';
import { credentialsFrom, hostFor, loadConfig } from '../utils/config';
import { logger } from '../utils/logger';
import { formatItemSummary } from './format';
import { promptForItemIds } from './prompt';

process.on('unhandledRejection', (reason) => {
  logger.error({ reason }, 'Unhandled promise rejection');
});

function createClient(): ItemLookupClient {
  const config = loadConfig();
  logger.level = config.logLevel;
  return createItemLookupClient(credentialsFrom(config), {
    host: hostFor(config),
    timeoutMs: config.timeoutMs,
  });
}

/**
 * Look up one item and print it. Lookup errors are reported and the caller
 * moves on to the next id.
 */
async function printLookup(client: ItemLookupClient, itemId: string, json: boolean): Promise<void> {
  try {
    const item = await client.getItemInfo(itemId);
    if (json) {
      console.log(JSON.stringify(item, null, 2));
    } else if (!isEmptyItem(item)) {
      console.log(formatItemSummary(item));
    }
  } catch (err) {
    if (!(err instanceof LookupError)) throw err;
    console.error(`${err.name}: ${err.message}`);
    process.exitCode = 1;
  }
}

const program = new Command();

program
  .name('catalog-lookup')
  .description('Look up products through the Amazon Product Advertising API')
  .version('0.1.0');

// ============================================================================
// lookup — Fetch and print items
// ============================================================================
program
  .command('lookup')
  .description('Look up item ids; prompts for ids when none are given')
  .argument('[itemIds...]', 'ASINs or other item ids')
  .option('--json', 'Print the full normalized record as JSON')
  .action(async (itemIds: string[], options: { json?: boolean }) => {
    const client = createClient();
    const json = options.json ?? false;
    if (itemIds.length === 0) {
      await promptForItemIds(process.stdin, process.stdout, (itemId) => printLookup(client, itemId, json));
      return;
    }
    for (const itemId of itemIds) {
      await printLookup(client, itemId, json);
    }
  });

// ============================================================================
// sign — Print a signed URL without sending it
// ============================================================================
program
  .command('sign')
  .description('Print the signed ItemLookup URL for an item id')
  .argument('<itemId>', 'ASIN or other item id')
  .action((itemId: string) => {
    const request = createClient().signLookup(itemId);
    console.log(request.url);
  });

program.parseAsync().catch((err: unknown) => {
  if (err instanceof LookupError) {
    console.error(`${err.name}: ${err.message}`);
  } else {
    logger.error({ err }, 'catalog-lookup failed');
  }
  process.exitCode = 1;
});
