#!/usr/bin/env node
import { Command, InvalidArgumentError } from 'commander';
import { createClientSettings, loadApiKeys, loadConfig, loadEnvFile, validateConfig } from './config-loader.js';
import { searchCommand, type SearchCommandOptions } from './commands/search.js';
import { ImageSearchClient } from './search-client.js';
import { IMAGE_TYPES, SAFE_SEARCH_LEVELS, type ImageType, type SafeSearch } from './types.js';
import { logger } from './logger.js';
import { VERSION } from './version.js';

function parseNonNegativeInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new InvalidArgumentError('Expected a non-negative integer.');
  }
  return parsed;
}

function parseChoice<T extends string>(choices: readonly T[]): (value: string) => T {
  return (value: string) => {
    const match = choices.find(choice => choice.toLowerCase() === value.toLowerCase());
    if (!match) {
      throw new InvalidArgumentError(`Allowed values: ${choices.join(', ')}.`);
    }
    return match;
  };
}

const parseSafeSearch = parseChoice<SafeSearch>(SAFE_SEARCH_LEVELS);
const parseImageType = parseChoice<ImageType>(IMAGE_TYPES);

async function main(): Promise<void> {
  const program = new Command();

  program
    .name('image-harvester')
    .description('Search Bing for images and list the results')
    .version(VERSION);

  program
    .command('search <query>')
    .description('Run a paginated image search')
    .option('-n, --max-images <n>', 'Maximum number of images to collect', parseNonNegativeInt)
    .option('-m, --market <code>', 'Market code, e.g. en-US')
    .option('-s, --safe-search <level>', `SafeSearch level (${SAFE_SEARCH_LEVELS.join(', ')})`, parseSafeSearch)
    .option('-t, --image-type <type>', `Image type (${IMAGE_TYPES.join(', ')})`, parseImageType)
    .option('-f, --filter <odata>', 'OData filter')
    .option('--min-width <px>', 'Minimum image width', parseNonNegativeInt)
    .option('--min-height <px>', 'Minimum image height', parseNonNegativeInt)
    .option('--json', 'Print results as JSON')
    .action(async (query: string, options: SearchCommandOptions) => {
      loadEnvFile();
      const config = loadConfig();
      const apiKeys = loadApiKeys();

      if (validateConfig(config, apiKeys).length > 0) {
        process.exitCode = 1;
        return;
      }

      const client = new ImageSearchClient(createClientSettings(config, apiKeys));
      process.exitCode = await searchCommand(client, config, query, options);
    });

  await program.parseAsync();
}

main().catch((error: unknown) => {
  logger.error('image-harvester failed', error);
  process.exit(1);
});
