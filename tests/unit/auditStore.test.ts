import { describe, expect, test } from 'vitest';

import { AuditStore } from '../../src/audit/auditStore.js';

function makeClock(startIso: string) {
  let current = Date.parse(startIso);
  return {
    now: () => new Date(current),
    advance: (ms: number) => {
      current += ms;
    }
  };
}

describe('AuditStore', () => {
  test('filters by tool, result and serial, newest first', () => {
    const store = new AuditStore(100);

    store.record({ tool: 'opendtu_get_inverters', result: 'success' });
    store.record({ tool: 'opendtu_set_limit', result: 'success', serial: '114181800001', limitType: 1, limitValue: 70 });
    store.record({
      tool: 'opendtu_set_limit',
      result: 'rejected',
      serial: '114181800002',
      errorKind: 'ApplianceRejected',
      message: 'Invalid inverter specified!'
    });

    const writes = store.query({ tool: 'opendtu_set_limit' });
    expect(writes.map((entry) => entry.serial)).toEqual(['114181800002', '114181800001']);

    const rejected = store.query({ result: 'rejected' });
    expect(rejected).toHaveLength(1);
    expect(rejected[0]?.message).toBe('Invalid inverter specified!');

    expect(store.query({ serial: '114181800001' })).toHaveLength(1);
  });

  test('drops the oldest entries beyond maxEntries', () => {
    const store = new AuditStore(2);

    store.record({ tool: 'a', result: 'success' });
    store.record({ tool: 'b', result: 'success' });
    store.record({ tool: 'c', result: 'success' });

    expect(store.query().map((entry) => entry.tool)).toEqual(['c', 'b']);
  });

  test('counts applied persistent writes per serial inside the window', () => {
    const clock = makeClock('2026-06-01T10:00:00.000Z');
    const store = new AuditStore(100, clock.now);
    const write = { tool: 'opendtu_set_limit', serial: '114181800001', limitType: 257, persistent: true };

    store.record({ ...write, result: 'success' });
    clock.advance(2 * 3_600_000);
    store.record({ ...write, result: 'success' });
    store.record({ ...write, result: 'rejected' });
    store.record({ ...write, result: 'success', serial: '114181800002' });
    store.record({ ...write, result: 'success', limitType: 1, persistent: false });

    expect(store.countPersistentWrites('114181800001', 86_400)).toBe(2);
    expect(store.countPersistentWrites('114181800001', 3_600)).toBe(1);
    expect(store.countPersistentWrites('114181800009', 86_400)).toBe(0);
  });
});
