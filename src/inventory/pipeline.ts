import { createLogger } from '../utils/logger.js';
import type { JssClassicClient } from '../jss-client.js';
import { fetchDetails, FetchOptions } from './fetcher.js';
import { normalizeFleet, NormalizeOptions } from './normalizer.js';
import { parsePatchRecord } from './patches.js';
import type { FetchFailure, FleetReport } from './types.js';

const logger = createLogger('pipeline');

export interface InventoryRunOptions extends FetchOptions, Omit<NormalizeOptions, 'failures'> {}

/**
 * One pass: list ids, fetch every detail record, normalize.
 *
 * Listing failures are fatal. Per-id detail failures follow
 * `failurePolicy` and end up in `report.failures`.
 */
export async function runInventory(client: JssClassicClient, options: InventoryRunOptions = {}): Promise<FleetReport> {
  const { concurrency, failurePolicy, onProgress, ...normalizeOptions } = options;
  const fetchOptions: FetchOptions = { concurrency, failurePolicy, onProgress };

  const computerIds = await client.listIdentifiers('computers');
  const computers = await fetchDetails(client, 'computers', computerIds, fetchOptions);

  const patchIds = await client.listIdentifiers('patches');
  const patchDetails = await fetchDetails(client, 'patches', patchIds, fetchOptions);
  const patches = patchDetails.records.map(({ id, record }) => parsePatchRecord(id, record));

  const failures: FetchFailure[] = [
    ...computers.failures.map((failure) => ({ ...failure, resource: 'computers' as const })),
    ...patchDetails.failures.map((failure) => ({ ...failure, resource: 'patches' as const })),
  ];

  if (failures.length > 0) {
    logger.warn(
      { failed: failures.map((failure) => `${failure.resource}/${failure.id}`) },
      `${failures.length} detail records could not be fetched; the report is incomplete`
    );
  }

  return normalizeFleet(computers.records, patches, { ...normalizeOptions, failures });
}
