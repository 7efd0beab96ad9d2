/**
 * Inventory Types
 * Shapes produced by the fetch stage and the record normalizer
 */

import type { ComputerRecord, ResourceType } from '../types/jss-api.js';

// ============================================================================
// Fetch stage
// ============================================================================

export type FetchFailureKind = 'http' | 'network' | 'malformed' | 'unknown';

export interface FetchFailure {
  id: number;
  resource?: ResourceType;
  kind: FetchFailureKind;
  message: string;
  statusCode?: number;
}

export interface FetchedRecord<T> {
  id: number;
  record: T;
}

export interface FetchResult<T> {
  records: FetchedRecord<T>[];
  failures: FetchFailure[];
}

// ============================================================================
// Tables
// ============================================================================

export type LookupTable<V> = Record<string, V>;

/** Item name -> number of (computer, item) occurrences */
export type FrequencyCounter = Record<string, number>;

export interface CounterRow {
  name: string;
  count: number;
}

/** Who a per-user entry belongs to; one tag per computer */
export interface UserTag {
  computerId: number;
  serialNumber: string;
  name: string;
  email: string;
  lastContact: string;
}

export interface UserEntry<T> extends UserTag {
  items: T[];
}

/** username -> one entry per computer assigned to that user */
export type UserTable<T> = LookupTable<UserEntry<T>[]>;

export interface ChromeExtensionsEntry extends UserEntry<string> {
  chromeVersion: string;
}

export interface VirtualMachinesEntry extends UserEntry<string> {
  hypervisor: string | null;
}

export interface SoftwareItem {
  name: string;
  path: string;
  version: string;
}

export interface AvailableUpdate {
  name: string;
  packageName: string;
  version: string;
}

export interface Asset {
  make: string;
  model: string;
  modelId: string;
  osName: string;
  osVersion: string;
  osBuild: string;
  diskEncryption: string | null;
  managed: boolean | null;
}

export interface AssetEntry extends UserTag {
  asset: Asset;
}

export interface PatchRef {
  id: number;
  name: string;
}

export interface PatchCompliance {
  applied: PatchRef[];
  missing: PatchRef[];
}

/** One row per (computer, missing patch), CSV friendly */
export interface MissingPatchRow {
  computerId: number;
  username: string;
  name: string;
  email: string;
  serialNumber: string;
  patchId: number;
  application: string;
  installedVersion: string;
}

export interface IpUserInfo {
  realname: string;
  username: string;
  lastCheckin: string;
}

export interface CrashReport {
  computerId: number;
  user: string;
  app: string;
}

export interface FleetCounters {
  services: FrequencyCounter;
  chromeExtensions: FrequencyCounter;
  virtualMachines: FrequencyCounter;
  applications: FrequencyCounter;
  plugins: FrequencyCounter;
}

export interface FleetReport {
  generatedAt: string;
  /** Computers that went through normalization (not stale, not duplicated) */
  computersProcessed: number;
  patchTitles: PatchRef[];
  /** Ids left out because their last check-in is too old */
  stale: number[];
  /** Ids whose detail fetch failed */
  failures: FetchFailure[];

  chromeExtensions: LookupTable<ChromeExtensionsEntry[]>;
  applications: UserTable<SoftwareItem>;
  plugins: UserTable<SoftwareItem>;
  services: UserTable<string>;
  virtualMachines: LookupTable<VirtualMachinesEntry[]>;
  availableUpdates: UserTable<AvailableUpdate>;
  availableSoftwareUpdates: UserTable<string>;
  assets: LookupTable<AssetEntry[]>;
  appliedPatches: UserTable<PatchRef>;
  missingPatches: UserTable<PatchRef>;
  missingPatchRows: MissingPatchRow[];
  /** computer id -> applied/missing partition of the fleet patch set */
  patchCompliance: LookupTable<PatchCompliance>;

  ipToComputer: LookupTable<ComputerRecord>;
  ipToUsername: LookupTable<string>;
  ipToUser: LookupTable<IpUserInfo>;

  counters: FleetCounters;
  /** attribute name -> value -> occurrences */
  extensionAttributeStats: LookupTable<FrequencyCounter>;
  crashReports: CrashReport[];
}
