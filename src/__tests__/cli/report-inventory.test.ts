import { describe, expect, test } from '@jest/globals';
import { applyCliOptions, parseArgs } from '../../cli/report-inventory.js';
import { loadConfig } from '../../utils/env-validation.js';
import { formatCounterRow, formatFailure } from '../../cli/output.js';

const config = loadConfig({
  CASPER_USER: 'api-reader',
  CASPER_PASS: 'test-secret',
  CASPER_HOST: 'casper.example.test',
});

describe('report-inventory CLI', () => {
  test('parseArgs reads every option', () => {
    expect(
      parseArgs([
        '-o',
        './reports',
        '--concurrency',
        '4',
        '--failure-policy',
        'abort',
        '--include-stale',
        '--stale-days',
        '60',
        '--insecure',
      ])
    ).toEqual({
      output: './reports',
      concurrency: 4,
      failurePolicy: 'abort',
      includeStale: true,
      staleDays: 60,
      insecure: true,
    });
  });

  test('parseArgs rejects bad values and unknown flags', () => {
    expect(() => parseArgs(['--concurrency', 'zero'])).toThrow('--concurrency expects a positive integer, got "zero"');
    expect(() => parseArgs(['--failure-policy', 'retry'])).toThrow('--failure-policy expects skip or abort, got "retry"');
    expect(() => parseArgs(['--verbose'])).toThrow('Unknown option: --verbose');
  });

  test('flags override the environment', () => {
    const merged = applyCliOptions(config, { output: '/tmp/out', concurrency: 6, includeStale: true, insecure: true });

    expect(merged).toMatchObject({
      outputDir: '/tmp/out',
      concurrency: 6,
      failurePolicy: 'skip',
      skipStale: false,
      staleDays: 30,
      rejectUnauthorized: false,
    });
  });

  test('no flags keeps the environment settings', () => {
    expect(applyCliOptions(config, {})).toEqual(config);
  });
});

describe('output formatting', () => {
  test('formatFailure names the resource, id and status', () => {
    expect(
      formatFailure({ id: 7, resource: 'computers', kind: 'http', message: 'Request failed with status 404', statusCode: 404 })
    ).toBe('computers 7: [http] Request failed with status 404 (HTTP 404)');
    expect(formatFailure({ id: 8, kind: 'network', message: 'socket hang up' })).toBe('record 8: [network] socket hang up');
  });

  test('formatCounterRow right-aligns the count', () => {
    expect(formatCounterRow({ name: 'sshd', count: 12 })).toBe('   12  sshd');
  });
});
