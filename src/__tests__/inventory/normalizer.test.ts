import { describe, expect, test } from '@jest/globals';
import {
  cleanServiceName,
  collectExtensionAttributeStats,
  extractComputerInventory,
  isStale,
  normalizeFleet,
  parseCrasher,
  splitChromeExtensions,
  splitVirtualMachines,
} from '../../inventory/normalizer.js';
import { counterFromUserTable, counterTotal } from '../../inventory/counter.js';
import type { ComputerRecord } from '../../types/jss-api.js';
import type { FetchFailure } from '../../inventory/types.js';
import { NOW, makeComputer, makeComputerRecord, makePatch } from '../helpers/fleet-fixtures.js';

const CHROME = { name: 'Google Chrome.app', path: '/Applications/Google Chrome.app', version: '124.0' };

const alice = makeComputer(1, {
  username: 'alice',
  realName: 'Alice Doe',
  ip: '10.0.0.1',
  services: ['sshd', 'com.apple.foo.12345678-ABCD-ABCD-ABCD-1234567890AB', 'sshd'],
  chromeExtensions: 'ext-a, ext-b,ext-a,,',
  virtualMachines: 'VirtualBox.app\nwin10\nwin10\nubuntu',
  applications: [CHROME, CHROME],
});

const bob = makeComputer(2, {
  username: 'bob',
  ip: '10.0.0.2',
  services: ['sshd', '0x7f80.com.apple.foo'],
  chromeExtensions: 'ext-a',
});

const anonymous = makeComputer(3, {
  ip: '10.0.0.3',
  services: ['sshd', 'cupsd'],
  chromeExtensions: 'ext-c',
});

const patches = [
  makePatch(101, 'OS Update', [1], [[2, '13.0']]),
  makePatch(102, 'Browser Update', [2]),
];

describe('normalizeFleet', () => {
  const report = normalizeFleet([anonymous, alice, bob, alice], patches, { now: NOW });

  test('processes each computer once, whatever the input order', () => {
    expect(report.computersProcessed).toBe(3);
    expect(report.appliedPatches['alice']).toHaveLength(1);
  });

  test('deduplicates items within a computer', () => {
    expect(report.services['alice'][0].items).toEqual(['sshd', 'com.apple.foo']);
    expect(report.chromeExtensions['alice'][0].items).toEqual(['ext-a', 'ext-b']);
    expect(report.applications['alice'][0].items).toEqual([CHROME]);
    expect(report.virtualMachines['alice'][0]).toMatchObject({ hypervisor: 'VirtualBox.app', items: ['win10', 'ubuntu'] });
  });

  test('tags every entry with the computer it came from', () => {
    expect(report.services['alice'][0]).toEqual({
      computerId: 1,
      serialNumber: 'SN1',
      name: 'Alice Doe',
      email: 'alice@example.test',
      lastContact: '2024-05-01 09:00:00',
      items: ['sshd', 'com.apple.foo'],
    });
    expect(report.chromeExtensions['alice'][0].chromeVersion).toBe('124.0');
    expect(report.chromeExtensions['bob'][0].chromeVersion).toBe('N/A');
  });

  test('counts (computer, item) occurrences, not distinct items', () => {
    expect(report.counters.services).toEqual({ sshd: 3, 'com.apple.foo': 2, cupsd: 1 });
    expect(counterTotal(report.counters.services)).toBe(6);
    expect(report.counters.chromeExtensions).toEqual({ 'ext-a': 2, 'ext-b': 1, 'ext-c': 1 });
    expect(report.counters.virtualMachines).toEqual({ win10: 1, ubuntu: 1 });
    expect(report.counters.applications).toEqual({ 'Google Chrome.app': 1 });
  });

  test('leaves computers without a username out of per-user tables but counts them', () => {
    const userTables = [
      report.services,
      report.chromeExtensions,
      report.applications,
      report.plugins,
      report.virtualMachines,
      report.availableUpdates,
      report.availableSoftwareUpdates,
      report.assets,
      report.appliedPatches,
      report.missingPatches,
    ];
    for (const table of userTables) {
      expect(Object.keys(table).sort()).toEqual(['alice', 'bob']);
    }
    expect(report.counters.services['cupsd']).toBe(1);
    expect(report.counters.chromeExtensions['ext-c']).toBe(1);
  });

  test('splits the fleet patch set into applied and missing per computer', () => {
    expect(report.appliedPatches['alice'][0].items).toEqual([{ id: 101, name: 'OS Update' }]);
    expect(report.missingPatches['alice'][0].items).toEqual([{ id: 102, name: 'Browser Update' }]);
    expect(report.appliedPatches['bob'][0].items).toEqual([{ id: 102, name: 'Browser Update' }]);
    expect(report.missingPatches['bob'][0].items).toEqual([{ id: 101, name: 'OS Update' }]);
    expect(report.patchCompliance['3']).toEqual({
      applied: [],
      missing: [
        { id: 101, name: 'OS Update' },
        { id: 102, name: 'Browser Update' },
      ],
    });
  });

  test('applied and missing cover the patch set without overlap', () => {
    const fullSet = report.patchTitles.map((patch) => patch.id).sort();
    for (const compliance of Object.values(report.patchCompliance)) {
      const applied = compliance.applied.map((patch) => patch.id);
      const missing = compliance.missing.map((patch) => patch.id);
      expect([...applied, ...missing].sort()).toEqual(fullSet);
      expect(applied.filter((id) => missing.includes(id))).toEqual([]);
    }
  });

  test('flattens missing patches into rows with the installed version', () => {
    expect(report.missingPatchRows).toEqual([
      {
        computerId: 1,
        username: 'alice',
        name: 'Alice Doe',
        email: 'alice@example.test',
        serialNumber: 'SN1',
        patchId: 102,
        application: 'Browser Update',
        installedVersion: 'N/A',
      },
      {
        computerId: 2,
        username: 'bob',
        name: 'mac-2',
        email: 'bob@example.test',
        serialNumber: 'SN2',
        patchId: 101,
        application: 'OS Update',
        installedVersion: '13.0',
      },
    ]);
  });

  test('builds the IP tables', () => {
    expect(report.ipToUsername).toEqual({ '10.0.0.1': 'alice', '10.0.0.2': 'bob' });
    expect(report.ipToUser['10.0.0.3']).toEqual({ realname: 'mac-3', username: '', lastCheckin: '2024-05-01 09:00:00' });
    expect(report.ipToComputer['10.0.0.2']).toBe(bob.record);
  });
});

describe('normalizeFleet scenarios', () => {
  test('patch 102 is missing for a computer that applied only 101', () => {
    const computerA = makeComputer(7, { username: 'a.user' });
    const report = normalizeFleet(
      [computerA],
      [makePatch(101, 'OS Update', [7]), makePatch(102, 'Browser Update', [])],
      { now: NOW }
    );

    expect(report.missingPatches['a.user'][0].items).toEqual([{ id: 102, name: 'Browser Update' }]);
  });

  test('two computers reporting sshd count twice', () => {
    const report = normalizeFleet(
      [makeComputer(1, { username: 'alice', services: ['sshd'] }), makeComputer(2, { username: 'bob', services: ['sshd'] })],
      [],
      { now: NOW }
    );

    expect(report.counters.services['sshd']).toBe(2);
  });

  test('re-deriving counters from the per-user tables matches the direct count', () => {
    const report = normalizeFleet(
      [
        alice,
        bob,
        makeComputer(4, { username: 'alice', services: ['sshd', 'httpd'], chromeExtensions: 'ext-b' }),
      ],
      [],
      { now: NOW }
    );

    expect(report.services['alice']).toHaveLength(2);
    expect(counterFromUserTable(report.services, (service) => service)).toEqual(report.counters.services);
    expect(counterFromUserTable(report.chromeExtensions, (ext) => ext)).toEqual(report.counters.chromeExtensions);
  });

  test('carries fetch failures and still builds the tables for the other ids', () => {
    const failures: FetchFailure[] = [{ id: 2, resource: 'computers', kind: 'network', message: 'socket hang up' }];
    const report = normalizeFleet([alice, makeComputer(3, { username: 'carol', services: ['sshd'] })], patches, {
      now: NOW,
      failures,
    });

    expect(report.failures).toEqual(failures);
    expect(Object.keys(report.services).sort()).toEqual(['alice', 'carol']);
    expect(report.counters.services).toEqual({ sshd: 2, 'com.apple.foo': 1 });
  });

  test('skips stale computers unless told otherwise', () => {
    const stale = makeComputer(5, { username: 'dave', services: ['sshd'], lastContact: '2024-03-01 09:00:00' });

    const skipped = normalizeFleet([bob, stale], [], { now: NOW });
    expect(skipped.stale).toEqual([5]);
    expect(skipped.computersProcessed).toBe(1);
    expect(skipped.services['dave']).toBeUndefined();

    const kept = normalizeFleet([bob, stale], [], { now: NOW, skipStale: false });
    expect(kept.stale).toEqual([]);
    expect(kept.services['dave'][0].items).toEqual(['sshd']);
  });

  test('a missing section only drops the computer from the tables built from it', () => {
    const record = makeComputerRecord(6, { username: 'erin', chromeExtensions: 'ext-a' });
    delete record.software;

    const report = normalizeFleet([{ id: 6, record }], [], { now: NOW });

    expect(report.services['erin']).toBeUndefined();
    expect(report.applications['erin']).toBeUndefined();
    expect(report.chromeExtensions['erin'][0].items).toEqual(['ext-a']);
  });

  test('the highest computer id wins an IP collision', () => {
    const report = normalizeFleet(
      [makeComputer(9, { username: 'late', ip: '10.0.0.9' }), makeComputer(8, { username: 'early', ip: '10.0.0.9' })],
      [],
      { now: NOW }
    );

    expect(report.ipToUsername['10.0.0.9']).toBe('late');
  });

  test('an application installed twice is listed once per computer', () => {
    const report = normalizeFleet(
      [
        makeComputer(1, {
          username: 'alice',
          applications: [
            { name: 'Slack.app', path: '/Applications/Slack.app', version: '4.1' },
            { name: 'Slack.app', path: '/Users/alice/Applications/Slack.app', version: '4.0' },
          ],
        }),
        makeComputer(2, {
          username: 'bob',
          applications: [{ name: 'Slack.app', path: '/Applications/Slack.app', version: '4.1' }],
        }),
      ],
      [],
      { now: NOW }
    );

    expect(report.applications['alice'][0].items).toEqual([
      { name: 'Slack.app', path: '/Applications/Slack.app', version: '4.1' },
    ]);
    expect(report.counters.applications).toEqual({ 'Slack.app': 2 });
    expect(counterFromUserTable(report.applications, (app) => app.name)).toEqual(report.counters.applications);
  });

  test('usernames that collide with object members are plain keys', () => {
    const report = normalizeFleet([makeComputer(1, { username: 'constructor', services: ['sshd'] })], [], { now: NOW });

    expect(report.services['constructor'][0].items).toEqual(['sshd']);
  });
});

describe('extractComputerInventory', () => {
  test('builds the asset and available updates', () => {
    const record: ComputerRecord = {
      general: { id: 11, name: 'mac-11', remote_management: { managed: true } },
      location: { username: 'frank' },
      hardware: {
        make: 'Apple',
        model: 'MacBook Pro',
        model_identifier: 'MacBookPro18,1',
        os_name: 'macOS',
        os_version: '14.4',
        os_build: '23E214',
        disk_encryption_configuration: '',
      },
      software: {
        available_updates: { update: { name: 'Safari', package_name: 'Safari17', version: '17.4' } },
        available_software_updates: ['Safari17.4-17.4 ', ''],
      },
    };

    const inventory = extractComputerInventory(11, record);

    expect(inventory.asset).toEqual({
      make: 'Apple',
      model: 'MacBook Pro',
      modelId: 'MacBookPro18,1',
      osName: 'macOS',
      osVersion: '14.4',
      osBuild: '23E214',
      diskEncryption: null,
      managed: true,
    });
    expect(inventory.availableUpdates).toEqual([{ name: 'Safari', packageName: 'Safari17', version: '17.4' }]);
    expect(inventory.availableSoftwareUpdates).toEqual(['Safari17.4-17.4']);
    expect(inventory.chromeExtensions).toBeUndefined();
    expect(inventory.tag).toEqual({
      computerId: 11,
      serialNumber: '',
      name: 'mac-11',
      email: 'N/A',
      lastContact: 'N/A',
    });
  });
});

describe('item parsing', () => {
  test('cleanServiceName strips GUID suffixes and hex prefixes', () => {
    expect(cleanServiceName('com.apple.foo.12345678-ABCD-abcd-ABCD-1234567890AB')).toBe('com.apple.foo');
    expect(cleanServiceName('0x7f80.com.apple.foo')).toBe('com.apple.foo');
    expect(cleanServiceName('  sshd ')).toBe('sshd');
  });

  test('splitChromeExtensions trims and drops blanks', () => {
    expect(splitChromeExtensions(' a , b,, a ')).toEqual(['a', 'b']);
    expect(splitChromeExtensions(undefined)).toEqual([]);
  });

  test('splitVirtualMachines reads the hypervisor from the first line', () => {
    expect(splitVirtualMachines('Parallels Desktop.app\n\nwin11\nwin11\n')).toEqual({
      hypervisor: 'Parallels Desktop.app',
      machines: ['win11'],
    });
    expect(splitVirtualMachines('')).toEqual({ hypervisor: null, machines: [] });
  });

  test('parseCrasher keeps the process name of the crash log', () => {
    expect(parseCrasher('/Library/Logs/DiagnosticReports/coreaudiod_2016-11-16-123214_Host.crash')).toBe('coreaudiod');
    expect(parseCrasher('No recent heavy crashers')).toBeUndefined();
    expect(parseCrasher(undefined)).toBeUndefined();
  });

  test('isStale prefers the epoch and ignores unreadable dates', () => {
    const epochRecord: ComputerRecord = {
      general: { last_contact_time: '2024-05-09 09:00:00', last_contact_time_epoch: new Date(2023, 0, 1).getTime() },
    };
    expect(isStale(epochRecord, 30, NOW)).toBe(true);
    expect(isStale({ general: { last_contact_time: 'never' } }, 30, NOW)).toBe(false);
    expect(isStale({}, 30, NOW)).toBe(false);
  });

  test('collectExtensionAttributeStats normalizes Number attributes', () => {
    const records: ComputerRecord[] = [
      { extension_attributes: [{ name: 'Battery Cycles', type: 'Number', value: '0042' }] },
      { extension_attributes: [{ name: 'Battery Cycles', type: 'Number', value: 42 }] },
      { extension_attributes: [{ name: 'FileVault', type: 'String', value: 'On' }] },
    ];

    expect(collectExtensionAttributeStats(records)).toEqual({
      'Battery Cycles': { '42': 2 },
      FileVault: { On: 1 },
    });
  });
});
