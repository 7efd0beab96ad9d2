/**
 * Record Normalizer
 *
 * Walks the fetched computer records once and builds the per-user tables,
 * IP tables and fleet-wide counters. Input order does not matter: records
 * are processed by ascending computer id and duplicates are dropped.
 */

import path from 'path';
import { createLogger } from '../utils/logger.js';
import type { ComputerRecord } from '../types/jss-api.js';
import {
  getCanonicalName,
  getEmail,
  getExtensionAttribute,
  getExtensionAttributes,
  getGeneral,
  getHardware,
  getIpAddress,
  getLastContact,
  getSoftware,
  getUsername,
} from './sections.js';
import { countOccurrences, createTable, dedupeBy, incrementCount, mergeCounters } from './counter.js';
import { computePatchCompliance, flattenMissingPatches, PatchRecord, toPatchRef } from './patches.js';
import type {
  Asset,
  AvailableUpdate,
  CrashReport,
  FetchFailure,
  FetchedRecord,
  FleetReport,
  FrequencyCounter,
  LookupTable,
  SoftwareItem,
  UserEntry,
  UserTag,
} from './types.js';

const logger = createLogger('normalizer');

export const CHROME_EXTENSIONS_ATTRIBUTE = 'Chrome Extensions';
export const VIRTUAL_MACHINES_ATTRIBUTE = 'Virtual Machines';
export const CRASHERS_ATTRIBUTE = 'crashers';
export const CHROME_APP_NAME = 'Google Chrome.app';

const NO_CRASHERS = new Set(['', 'No recent heavy crashers']);
const DAY_MS = 24 * 60 * 60 * 1000;

export interface NormalizeOptions {
  /** Leave out computers whose last check-in is older than staleDays */
  skipStale?: boolean;
  staleDays?: number;
  /** Reference time for the stale check */
  now?: Date;
  /** Fetch failures to carry into the report */
  failures?: FetchFailure[];
}

// ============================================================================
// Per-computer extraction
// ============================================================================

const GUID_SUFFIX = /^(.*)\.[0-9A-F]{8}(?:-[0-9A-F]{4}){3}-[0-9A-F]{12}$/i;
const HEX_PREFIX = /^0x[0-9a-f]{1,16}\.(.*)$/i;
const CRASH_FILE = /^(.*)_\d{4}-\d{2}-\d{2}-\d{6}_.*$/;

/**
 * Strip per-launch decorations so instances of one service share a name:
 * `com.apple.foo.<GUID>` and `0x7f80.com.apple.foo` both become `com.apple.foo`.
 */
export function cleanServiceName(raw: string): string {
  const withoutGuid = raw.trim().replace(GUID_SUFFIX, '$1');
  return withoutGuid.replace(HEX_PREFIX, '$1');
}

export function splitChromeExtensions(value: string | undefined): string[] {
  if (!value) return [];
  return dedupeBy(
    value
      .split(',')
      .map((ext) => ext.trim())
      .filter((ext) => ext !== ''),
    (ext) => ext
  );
}

/**
 * The attribute lists the hypervisor app on the first line and one VM per line after it
 */
export function splitVirtualMachines(value: string | undefined): { hypervisor: string | null; machines: string[] } {
  const lines = (value ?? '')
    .split('\n')
    .map((line) => line.trim())
    .filter((line) => line !== '');
  if (lines.length === 0) return { hypervisor: null, machines: [] };
  const [hypervisor, ...machines] = lines;
  return { hypervisor, machines: dedupeBy(machines, (vm) => vm) };
}

/**
 * `/Library/Logs/coreaudiod_2016-11-16-123214_Host.crash` -> `coreaudiod`
 */
export function parseCrasher(value: string | undefined): string | undefined {
  const raw = value?.trim() ?? '';
  if (NO_CRASHERS.has(raw)) return undefined;
  return path.posix.basename(raw).replace(CRASH_FILE, '$1');
}

/**
 * One item per name. When a name is installed more than once (two paths or
 * versions), the first entry reported wins.
 */
const toSoftwareItems = (items: Array<{ name: string; path?: string; version?: string }> | undefined): SoftwareItem[] | undefined =>
  items &&
  dedupeBy(
    items.map((item) => ({ name: item.name, path: item.path ?? '', version: item.version ?? '' })),
    (item) => item.name
  );

const itemNames = (items: readonly SoftwareItem[]): string[] => items.map((item) => item.name);

export interface ComputerInventory {
  id: number;
  username?: string;
  ip?: string;
  tag: UserTag;
  chromeExtensions?: string[];
  chromeVersion: string;
  applications?: SoftwareItem[];
  plugins?: SoftwareItem[];
  services?: string[];
  virtualMachines?: { hypervisor: string | null; machines: string[] };
  availableUpdates?: AvailableUpdate[];
  availableSoftwareUpdates?: string[];
  asset?: Asset;
  crashedApp?: string;
}

/**
 * Extract every item list of one computer. A list is undefined when the
 * section it comes from is missing, so the computer is left out of that
 * table only.
 */
export function extractComputerInventory(id: number, record: ComputerRecord): ComputerInventory {
  const general = getGeneral(record);
  const hardware = getHardware(record);
  const software = getSoftware(record);
  const attributes = getExtensionAttributes(record);
  const lastContact = general?.last_contact_time?.trim();

  const tag: UserTag = {
    computerId: id,
    serialNumber: general?.serial_number ?? '',
    name: getCanonicalName(record),
    email: getEmail(record),
    lastContact: lastContact ? lastContact : 'N/A',
  };

  const applications = toSoftwareItems(software?.applications);
  const chromeVersion = applications?.find((app) => app.name === CHROME_APP_NAME)?.version || 'N/A';

  const availableUpdates = software?.available_updates?.map((update) => ({
    name: update.name,
    packageName: update.package_name ?? '',
    version: update.version ?? '',
  }));

  const diskEncryption = hardware?.disk_encryption_configuration?.trim();

  return {
    id,
    username: getUsername(record),
    ip: getIpAddress(record),
    tag,
    chromeExtensions: attributes && splitChromeExtensions(getExtensionAttribute(record, CHROME_EXTENSIONS_ATTRIBUTE)?.value),
    chromeVersion,
    applications,
    plugins: toSoftwareItems(software?.plugins),
    services:
      software?.running_services &&
      dedupeBy(
        software.running_services.map(cleanServiceName).filter((svc) => svc !== ''),
        (svc) => svc
      ),
    virtualMachines: attributes && splitVirtualMachines(getExtensionAttribute(record, VIRTUAL_MACHINES_ATTRIBUTE)?.value),
    availableUpdates:
      availableUpdates && dedupeBy(availableUpdates, (u) => `${u.name}\u0000${u.packageName}\u0000${u.version}`),
    availableSoftwareUpdates:
      software?.available_software_updates &&
      dedupeBy(
        software.available_software_updates.map((upd) => upd.trim()).filter((upd) => upd !== ''),
        (upd) => upd
      ),
    asset: hardware && {
      make: hardware.make ?? '',
      model: hardware.model ?? '',
      modelId: hardware.model_identifier ?? '',
      osName: hardware.os_name ?? '',
      osVersion: hardware.os_version ?? '',
      osBuild: hardware.os_build ?? '',
      diskEncryption: diskEncryption ? diskEncryption : null,
      managed: general?.remote_management?.managed ?? null,
    },
    crashedApp: attributes && parseCrasher(getExtensionAttribute(record, CRASHERS_ATTRIBUTE)?.value),
  };
}

/**
 * Whether the last check-in is older than staleDays. Unknown dates are not stale.
 */
export function isStale(record: ComputerRecord, staleDays: number, now: Date): boolean {
  const lastContact = getLastContact(record);
  if (!lastContact) return false;
  return lastContact.getTime() < now.getTime() - staleDays * DAY_MS;
}

// ============================================================================
// Fleet tables
// ============================================================================

const appendEntry = <E>(table: LookupTable<E[]>, username: string, entry: E): void => {
  const entries = table[username] ?? [];
  entries.push(entry);
  table[username] = entries;
};

const userEntry = <T>(tag: UserTag, items: T[]): UserEntry<T> => ({ ...tag, items });

/**
 * Count extension attribute values across the fleet: name -> value -> occurrences
 */
export function collectExtensionAttributeStats(records: readonly ComputerRecord[]): LookupTable<FrequencyCounter> {
  const stats = createTable<FrequencyCounter>();
  for (const record of records) {
    for (const attribute of getExtensionAttributes(record) ?? []) {
      let value = attribute.value ?? '';
      if (attribute.type === 'Number' && /^-?\d+$/.test(value.trim())) {
        value = String(Number.parseInt(value, 10));
      }
      const counter = stats[attribute.name] ?? createTable<number>();
      incrementCount(counter, value);
      stats[attribute.name] = counter;
    }
  }
  return stats;
}

/**
 * Build every lookup table and counter from the fetched records
 */
export function normalizeFleet(
  computers: readonly FetchedRecord<ComputerRecord>[],
  patches: readonly PatchRecord[],
  options: NormalizeOptions = {}
): FleetReport {
  const { skipStale = true, staleDays = 30, now = new Date(), failures = [] } = options;

  const fleetPatches = dedupeBy(
    [...patches].sort((a, b) => a.id - b.id),
    (patch) => String(patch.id)
  );
  const patchesById = new Map(fleetPatches.map((patch) => [patch.id, patch]));

  const report: FleetReport = {
    generatedAt: now.toISOString(),
    computersProcessed: 0,
    patchTitles: fleetPatches.map(toPatchRef),
    stale: [],
    failures: [...failures],
    chromeExtensions: createTable(),
    applications: createTable(),
    plugins: createTable(),
    services: createTable(),
    virtualMachines: createTable(),
    availableUpdates: createTable(),
    availableSoftwareUpdates: createTable(),
    assets: createTable(),
    appliedPatches: createTable(),
    missingPatches: createTable(),
    missingPatchRows: [],
    patchCompliance: createTable(),
    ipToComputer: createTable(),
    ipToUsername: createTable(),
    ipToUser: createTable(),
    counters: {
      services: createTable(),
      chromeExtensions: createTable(),
      virtualMachines: createTable(),
      applications: createTable(),
      plugins: createTable(),
    },
    extensionAttributeStats: createTable(),
    crashReports: [],
  };

  const ordered = dedupeBy(
    [...computers].sort((a, b) => a.id - b.id),
    (entry) => String(entry.id)
  );

  const processed: ComputerRecord[] = [];
  const serviceLists: string[][] = [];
  const extensionLists: string[][] = [];
  const vmLists: string[][] = [];
  const applicationLists: string[][] = [];
  const pluginLists: string[][] = [];
  const crashReports: CrashReport[] = [];

  for (const { id, record } of ordered) {
    if (skipStale && isStale(record, staleDays, now)) {
      report.stale.push(id);
      logger.debug({ id }, 'Skipping stale computer');
      continue;
    }

    processed.push(record);
    const inventory = extractComputerInventory(id, record);
    const { username, ip, tag } = inventory;

    // Counters include computers without a username
    if (inventory.services) serviceLists.push(inventory.services);
    if (inventory.chromeExtensions) extensionLists.push(inventory.chromeExtensions);
    if (inventory.virtualMachines) vmLists.push(inventory.virtualMachines.machines);
    if (inventory.applications) applicationLists.push(itemNames(inventory.applications));
    if (inventory.plugins) pluginLists.push(itemNames(inventory.plugins));
    if (inventory.crashedApp) crashReports.push({ computerId: id, user: tag.name, app: inventory.crashedApp });

    const compliance = computePatchCompliance(id, fleetPatches);
    report.patchCompliance[String(id)] = compliance;

    if (ip) {
      report.ipToComputer[ip] = record;
      report.ipToUser[ip] = { realname: tag.name, username: username ?? '', lastCheckin: tag.lastContact };
      if (username) report.ipToUsername[ip] = username;
    }

    if (username) {
      if (inventory.chromeExtensions) {
        appendEntry(report.chromeExtensions, username, {
          ...userEntry(tag, inventory.chromeExtensions),
          chromeVersion: inventory.chromeVersion,
        });
      }
      if (inventory.applications) appendEntry(report.applications, username, userEntry(tag, inventory.applications));
      if (inventory.plugins) appendEntry(report.plugins, username, userEntry(tag, inventory.plugins));
      if (inventory.services) appendEntry(report.services, username, userEntry(tag, inventory.services));
      if (inventory.virtualMachines) {
        appendEntry(report.virtualMachines, username, {
          ...userEntry(tag, inventory.virtualMachines.machines),
          hypervisor: inventory.virtualMachines.hypervisor,
        });
      }
      if (inventory.availableUpdates) {
        appendEntry(report.availableUpdates, username, userEntry(tag, inventory.availableUpdates));
      }
      if (inventory.availableSoftwareUpdates) {
        appendEntry(report.availableSoftwareUpdates, username, userEntry(tag, inventory.availableSoftwareUpdates));
      }
      if (inventory.asset) appendEntry(report.assets, username, { ...tag, asset: inventory.asset });

      appendEntry(report.appliedPatches, username, userEntry(tag, compliance.applied));
      appendEntry(report.missingPatches, username, userEntry(tag, compliance.missing));
      report.missingPatchRows.push(...flattenMissingPatches(tag, username, compliance.missing, patchesById));
    }
  }

  report.computersProcessed = processed.length;
  report.counters = {
    services: mergeCounters(...serviceLists.map(countOccurrences)),
    chromeExtensions: mergeCounters(...extensionLists.map(countOccurrences)),
    virtualMachines: mergeCounters(...vmLists.map(countOccurrences)),
    applications: mergeCounters(...applicationLists.map(countOccurrences)),
    plugins: mergeCounters(...pluginLists.map(countOccurrences)),
  };
  report.extensionAttributeStats = collectExtensionAttributeStats(processed);
  report.crashReports = crashReports;

  logger.info(
    {
      processed: report.computersProcessed,
      stale: report.stale.length,
      failures: report.failures.length,
      users: Object.keys(report.appliedPatches).length,
      patchTitles: fleetPatches.length,
    },
    'Normalized fleet records'
  );

  return report;
}
