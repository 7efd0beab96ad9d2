import pLimit from 'p-limit';
import { createLogger } from '../utils/logger.js';
import { normalizeError, toFetchFailure } from '../utils/error-handler.js';
import { AuthenticationError } from '../utils/errors.js';
import type { FailurePolicy } from '../utils/env-validation.js';
import type { JssClassicClient } from '../jss-client.js';
import type { ComputerRecord, PatchTitleDetail, ResourceType } from '../types/jss-api.js';
import type { FetchFailure, FetchResult, FetchedRecord } from './types.js';

const logger = createLogger('fetcher');

export interface FetchOptions {
  /** Parallel requests; 1 fetches sequentially */
  concurrency?: number;
  /** skip: record the failed id and continue. abort: rethrow the first failure */
  failurePolicy?: FailurePolicy;
  onProgress?: (completed: number, total: number) => void;
}

/**
 * Fetch one record per id. Results come back in id order whatever order the
 * requests complete in. Authentication failures always abort.
 */
export async function fetchAll<T>(
  ids: readonly number[],
  fetchOne: (id: number) => Promise<T>,
  options: FetchOptions & { label?: string } = {}
): Promise<FetchResult<T>> {
  const { concurrency = 1, failurePolicy = 'skip', onProgress, label = 'records' } = options;
  const limit = pLimit(Number.isFinite(concurrency) ? Math.max(1, Math.floor(concurrency)) : 1);

  const records: Array<FetchedRecord<T> | undefined> = new Array(ids.length);
  const failures: Array<FetchFailure | undefined> = new Array(ids.length);
  let completed = 0;

  logger.info({ total: ids.length, concurrency, failurePolicy }, `Fetching ${ids.length} ${label}`);

  await Promise.all(
    ids.map((id, index) =>
      limit(async () => {
        try {
          records[index] = { id, record: await fetchOne(id) };
        } catch (error) {
          const normalized = normalizeError(error, { id });
          if (failurePolicy === 'abort' || normalized instanceof AuthenticationError) {
            limit.clearQueue();
            throw normalized;
          }
          failures[index] = toFetchFailure(id, normalized);
          logger.warn({ id, error: normalized.toDetailedString() }, `Skipping ${label} ${id}`);
        }
        completed += 1;
        onProgress?.(completed, ids.length);
      })
    )
  );

  const result: FetchResult<T> = {
    records: records.filter((entry): entry is FetchedRecord<T> => entry !== undefined),
    failures: failures.filter((entry): entry is FetchFailure => entry !== undefined),
  };

  logger.info(
    { fetched: result.records.length, failed: result.failures.length },
    `Fetched ${result.records.length}/${ids.length} ${label}`
  );

  return result;
}

/**
 * Fetch the detail record of every id of a resource
 */
export async function fetchDetails(
  client: JssClassicClient,
  resource: 'computers',
  ids: readonly number[],
  options?: FetchOptions
): Promise<FetchResult<ComputerRecord>>;
export async function fetchDetails(
  client: JssClassicClient,
  resource: 'patches',
  ids: readonly number[],
  options?: FetchOptions
): Promise<FetchResult<PatchTitleDetail>>;
export async function fetchDetails(
  client: JssClassicClient,
  resource: ResourceType,
  ids: readonly number[],
  options: FetchOptions = {}
): Promise<FetchResult<ComputerRecord> | FetchResult<PatchTitleDetail>> {
  if (resource === 'computers') {
    return fetchAll(ids, (id) => client.getComputerDetails(id), { ...options, label: 'computers' });
  }
  return fetchAll(ids, (id) => client.getPatchDetails(id), { ...options, label: 'patches' });
}
