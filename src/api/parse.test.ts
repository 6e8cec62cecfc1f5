import { describe, expect, test } from 'vitest';
import {
  ResponseFormatError,
  parseConfig,
  parseConnections,
  parseEvents,
  parseIgnores,
  parseSystemInfo,
  parseVersion,
} from './parse.js';

describe('parseConfig', () => {
  test('maps folders and devices, falling back to ids for missing names', () => {
    const config = parseConfig({
      folders: [
        { id: 'docs', label: 'Documents', path: '~/docs', type: 'sendreceive' },
        { id: 'raw', label: '', path: '/srv/raw' },
      ],
      devices: [{ deviceID: 'DEV1', name: 'Laptop' }, { deviceID: 'DEV2' }],
    });

    expect(config).toEqual({
      folders: [
        { id: 'docs', label: 'Documents', path: '~/docs' },
        { id: 'raw', label: 'raw', path: '/srv/raw' },
      ],
      devices: [
        { deviceId: 'DEV1', name: 'Laptop' },
        { deviceId: 'DEV2', name: 'DEV2' },
      ],
    });
  });

  test('treats null lists as empty', () => {
    expect(parseConfig({ folders: null, devices: null })).toEqual({ folders: [], devices: [] });
  });

  test('rejects a folder without a path', () => {
    expect(() => parseConfig({ folders: [{ id: 'docs' }] })).toThrow(
      'Unexpected config response: "path" must be a string'
    );
  });

  test('rejects a non-object body', () => {
    expect(() => parseConfig([])).toThrow(ResponseFormatError);
  });
});

describe('parseSystemInfo', () => {
  test('reads id, home and uptime', () => {
    expect(parseSystemInfo({ myID: 'SELF', tilde: '/home/user', uptime: 42 })).toEqual({
      myId: 'SELF',
      tilde: '/home/user',
      uptimeSec: 42,
    });
  });
});

describe('parseVersion', () => {
  test('fills optional fields', () => {
    expect(parseVersion({ version: 'v1.27.0' })).toEqual({
      version: 'v1.27.0',
      longVersion: 'v1.27.0',
      os: '',
      arch: '',
    });
  });
});

describe('parseConnections', () => {
  test('keeps every device with its connected and paused flags', () => {
    const result = parseConnections(
      {
        total: { inBytesTotal: 500, outBytesTotal: 300, at: '2024-01-01T00:00:00Z' },
        connections: {
          DEV1: { connected: true, paused: false, address: '10.0.0.1:22000', inBytesTotal: 5 },
          DEV2: { connected: false, paused: true, address: '' },
        },
      },
      1
    );

    expect(result).toEqual({
      total: { inBytesTotal: 500, outBytesTotal: 300, at: Date.UTC(2024, 0, 1) },
      deviceConnections: {
        DEV1: {
          connected: true,
          address: '10.0.0.1:22000',
          paused: false,
          inBytesTotal: 5,
          outBytesTotal: 0,
        },
        DEV2: { connected: false, address: '', paused: true, inBytesTotal: 0, outBytesTotal: 0 },
      },
    });
  });

  test('falls back to now for a bad timestamp', () => {
    const result = parseConnections({ total: { at: 'not a time' } }, 1234);
    expect(result.total).toEqual({ inBytesTotal: 0, outBytesTotal: 0, at: 1234 });
    expect(result.deviceConnections).toEqual({});
  });
});

describe('parseIgnores', () => {
  test('reads both lists, null meaning empty', () => {
    expect(parseIgnores({ ignore: ['*.tmp'], expanded: null })).toEqual({
      ignorePatterns: ['*.tmp'],
      expandedPatterns: [],
    });
  });

  test('rejects non-string patterns', () => {
    expect(() => parseIgnores({ ignore: [1] })).toThrow(
      'Unexpected ignores response: "ignore" must be a list of strings'
    );
  });
});

describe('parseEvents', () => {
  test('maps events and keeps raw data', () => {
    expect(
      parseEvents([
        { id: 7, type: 'ItemStarted', time: '2024-01-01T00:00:00Z', data: { folder: 'docs' } },
      ])
    ).toEqual([
      { id: 7, type: 'ItemStarted', time: '2024-01-01T00:00:00Z', data: { folder: 'docs' } },
    ]);
  });

  test('null means no events', () => {
    expect(parseEvents(null)).toEqual([]);
  });

  test('rejects an event without a numeric id', () => {
    expect(() => parseEvents([{ id: '7', type: 'ItemStarted' }])).toThrow(
      'Unexpected events response: "id" must be a number'
    );
  });
});
