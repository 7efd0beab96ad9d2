/**
 * Fleet inventory reporting for the JSS Classic API
 */

export { JssClassicClient } from './jss-client.js';
export type { JssClassicClientConfig } from './jss-client.js';

export { fetchAll, fetchDetails } from './inventory/fetcher.js';
export type { FetchOptions } from './inventory/fetcher.js';
export { runInventory } from './inventory/pipeline.js';
export type { InventoryRunOptions } from './inventory/pipeline.js';
export {
  normalizeFleet,
  extractComputerInventory,
  cleanServiceName,
  splitChromeExtensions,
  splitVirtualMachines,
  parseCrasher,
  isStale,
  collectExtensionAttributeStats,
} from './inventory/normalizer.js';
export type { ComputerInventory, NormalizeOptions } from './inventory/normalizer.js';
export { parsePatchVersions, parsePatchRecord, computePatchCompliance, flattenMissingPatches } from './inventory/patches.js';
export type { PatchRecord, PatchVersion } from './inventory/patches.js';
export { countOccurrences, incrementCount, mergeCounters, sortCounter, counterFromUserTable, counterTotal } from './inventory/counter.js';
export {
  getGeneral,
  getLocation,
  getHardware,
  getSoftware,
  getExtensionAttributes,
  getUsername,
  getIpAddress,
  getCanonicalName,
  getLastContact,
} from './inventory/sections.js';
export { writeReport, buildReportFiles, missingPatchesCsv, summarizeReport } from './inventory/report-writer.js';
export type { RunSummary, WrittenReport } from './inventory/report-writer.js';
export type * from './inventory/types.js';

export { JssApiError, NetworkError, HttpStatusError, AuthenticationError, MalformedResponseError } from './utils/errors.js';
export { loadConfig, validateEnvironment, EnvValidationError } from './utils/env-validation.js';
export type { InventoryConfig, FailurePolicy } from './utils/env-validation.js';
export type { ComputerRecord, PatchTitleDetail, ResourceType } from './types/jss-api.js';
