#!/usr/bin/env node
import { Command } from 'commander';
import dotenv from 'dotenv';
import { BoundedKeyedCache } from './cache/boundedCache.js';
import { ConditionalFetcher } from './clients/conditionalFetcher.js';
import { FetchTransport } from './clients/transport.js';
import { buildFetchContext, type RawFetchOptions } from './config.js';
import { isConditionalFetchError } from './errors.js';
import { runFetchSession } from './session/fetchSession.js';

dotenv.config();

const program = new Command();
program
  .name('conditional-fetch')
  .description('Fetch files over HTTP(S), keeping validators and bodies in a size-bounded LRU cache.');

program
  .command('fetch')
  .description('Fetch each resource several times; repeats should be answered from the cache.')
  .argument('<resources...>', 'Resource paths on the host, e.g. /images/logo.png')
  .option('-H, --host <hostname>', 'Host in hostname[:port] form (default FETCH_HOST).')
  .option('--scheme <scheme>', 'http or https (default https).')
  .option('--max-bytes <number>', 'Cache byte budget (default 204800).')
  .option('--repeat <number>', 'Fetches per resource (default 2).')
  .option('--timeout <ms>', 'Per-request timeout in ms (default 30000).')
  .option('-v, --verbose', 'Log cache accounting and dump the cache after every fetch.')
  .action(async (resources: string[], rawOptions: RawFetchOptions) => {
    await handleFetch(resources, rawOptions);
  });

program.parseAsync().catch((error: unknown) => {
  if (isConditionalFetchError(error)) {
    console.error(`Error: ${error.message}`);
  } else {
    console.error(error);
  }
  process.exitCode = 1;
});

async function handleFetch(resources: string[], rawOptions: RawFetchOptions) {
  const context = buildFetchContext(resources, rawOptions);
  const cache = new BoundedKeyedCache({
    maxBytes: context.maxBytes,
    verbose: context.verbose,
    logger: createLogger('cache'),
  });
  const fetcher = new ConditionalFetcher({
    cache,
    transport: new FetchTransport({ scheme: context.scheme, timeoutMs: context.timeoutMs }),
    logger: createLogger('fetch'),
  });

  console.log(
    `Fetching ${context.resources.length} resource(s) from ${context.scheme}://${context.host}, ${context.repeat} time(s) each...`,
  );

  const summary = await runFetchSession(fetcher, {
    host: context.host,
    resources: context.resources,
    repeat: context.repeat,
    logger: (message) => console.log(message),
    onFetched: (resourceId, result) => {
      if (context.verbose) {
        console.log(`${resourceId}: status ${result.status}${result.fromCache ? ' (from cache)' : ''}`);
        console.log(cache.describe());
      }
    },
  });

  for (const report of summary.resources) {
    const verdict =
      report.fingerprintsMatch === undefined ? 'not compared' : report.fingerprintsMatch ? 'match' : 'MISMATCH';
    console.log(`${report.resourceId}: ${report.outcomes.join(', ')} (fingerprints ${verdict})`);
  }
  console.log(`Cache holds ${cache.size} item(s), ${cache.usedBytes}/${cache.maxBytes} bytes.`);

  if (!summary.ok) {
    process.exitCode = 1;
  }
}

function createLogger(scope: string) {
  return (message: string) => console.log(`[${scope}] ${message}`);
}
