import type { ConditionalFetcher } from '../clients/conditionalFetcher.js';
import { CacheInconsistencyError } from '../errors.js';
import type { FetchResult, Logger } from '../types/index.js';
import { fingerprintHex } from '../utils/hash.js';

export type AttemptOutcome = 'fetched' | 'cached' | 'failed' | 'inconsistent';

export interface FetchSessionOptions {
  host: string;
  resources: string[];
  /** Fetches per resource; the first primes the cache, the rest should be served from it. */
  repeat: number;
  logger?: Logger;
  onFetched?: (resourceId: string, result: FetchResult) => void;
}

export interface ResourceReport {
  resourceId: string;
  outcomes: AttemptOutcome[];
  fetchedFingerprint?: string;
  cachedFingerprint?: string;
  /** Undefined until the resource was both fetched and served from cache. */
  fingerprintsMatch?: boolean;
}

export interface FetchSessionSummary {
  ok: boolean;
  resources: ResourceReport[];
}

export async function runFetchSession(
  fetcher: ConditionalFetcher,
  options: FetchSessionOptions,
): Promise<FetchSessionSummary> {
  const reports: ResourceReport[] = [];

  for (const resourceId of options.resources) {
    const report: ResourceReport = { resourceId, outcomes: [] };

    for (let attempt = 0; attempt < options.repeat; attempt += 1) {
      const outcome = await fetchAttempt(fetcher, options, resourceId, report);
      report.outcomes.push(outcome);
    }

    if (report.fetchedFingerprint !== undefined && report.cachedFingerprint !== undefined) {
      report.fingerprintsMatch = report.fetchedFingerprint === report.cachedFingerprint;
      if (!report.fingerprintsMatch) {
        options.logger?.(`Error: the file fetched for ${resourceId} does not match the cached file.`);
      }
    }

    reports.push(report);
  }

  const ok = reports.every(
    (report) =>
      report.fingerprintsMatch !== false &&
      report.outcomes.every((outcome) => outcome === 'fetched' || outcome === 'cached'),
  );
  return { ok, resources: reports };
}

async function fetchAttempt(
  fetcher: ConditionalFetcher,
  options: FetchSessionOptions,
  resourceId: string,
  report: ResourceReport,
): Promise<AttemptOutcome> {
  let result: FetchResult;
  try {
    result = await fetcher.get(options.host, resourceId);
  } catch (error) {
    if (error instanceof CacheInconsistencyError) {
      options.logger?.(`Error: ${error.message}`);
      return 'inconsistent';
    }
    throw error;
  }

  options.onFetched?.(resourceId, result);

  if (!result.success || !result.body) {
    options.logger?.(`Error: did not fetch ${resourceId} (status ${result.status}).`);
    return 'failed';
  }

  if (result.fromCache) {
    report.cachedFingerprint = fingerprintHex(result.body);
    options.logger?.(`Cache hit for: ${resourceId}`);
    return 'cached';
  }

  report.fetchedFingerprint = fingerprintHex(result.body);
  options.logger?.(`Fetched and cached: ${resourceId}`);
  return 'fetched';
}
