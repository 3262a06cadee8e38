// Tests for the alert store

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { AlertStore, compareAlertIds } from './alert-store.js';
import { StorageError } from '../../core/errors.js';
import type { Alert } from '../../models/alert.js';

function makeAlert(id: string, overrides: Partial<Alert> = {}): Alert {
  return {
    id,
    createdAt: '2026-02-01T00:00:00.000Z',
    type: 'drift',
    severity: 'WARNING',
    title: `Alert ${id}`,
    message: 'drift',
    context: { filePath: 'src/calc.ts' },
    fingerprint: `fp-${id}`,
    occurrenceCount: 1,
    lastSeenAt: '2026-02-01T00:00:00.000Z',
    lastDeliveredAt: null,
    resolved: false,
    resolvedAt: null,
    resolutionNote: null,
    deliveryLog: {},
    ...overrides
  };
}

describe('AlertStore', () => {
  let testDir: string;
  let filePath: string;

  beforeEach(async () => {
    testDir = await fs.mkdtemp(path.join(os.tmpdir(), 'driftwatch-alerts-'));
    filePath = path.join(testDir, '.driftwatch', 'alerts.json');
  });

  afterEach(async () => {
    await fs.rm(testDir, { recursive: true, force: true });
  });

  describe('allocateId', () => {
    it('should hand out sequential zero-padded IDs', () => {
      const store = new AlertStore();
      expect(store.allocateId()).toBe('ALERT-000001');
      expect(store.allocateId()).toBe('ALERT-000002');
    });
  });

  describe('put/get', () => {
    it('should return copies that do not alias stored alerts', async () => {
      const store = new AlertStore();
      await store.put(makeAlert('ALERT-000001'));

      const copy = store.get('ALERT-000001');
      expect(copy).not.toBeNull();
      if (copy) copy.title = 'changed';

      expect(store.get('ALERT-000001')?.title).toBe('Alert ALERT-000001');
    });

    it('should return null for unknown IDs', () => {
      expect(new AlertStore().get('ALERT-000404')).toBeNull();
    });
  });

  describe('findOpenByFingerprint', () => {
    it('should only find open alerts', async () => {
      const store = new AlertStore();
      await store.put(makeAlert('ALERT-000001', { fingerprint: 'same' }));
      expect(store.findOpenByFingerprint('same')?.id).toBe('ALERT-000001');

      await store.put(makeAlert('ALERT-000001', { fingerprint: 'same', resolved: true }));
      expect(store.findOpenByFingerprint('same')).toBeNull();
    });
  });

  describe('list', () => {
    let store: AlertStore;

    beforeEach(async () => {
      store = new AlertStore();
      await store.put(makeAlert('ALERT-000003', { severity: 'CRITICAL', lastSeenAt: '2026-02-03T00:00:00.000Z' }));
      await store.put(makeAlert('ALERT-000001', { severity: 'INFO', type: 'scan_error' }));
      await store.put(makeAlert('ALERT-000002', {
        severity: 'CRITICAL',
        resolved: true,
        context: { filePath: 'src/other.ts' }
      }));
    });

    it('should list everything sorted by ID', () => {
      expect(store.list().map(a => a.id)).toEqual(['ALERT-000001', 'ALERT-000002', 'ALERT-000003']);
    });

    it('should filter by severity and status', () => {
      expect(store.list({ severity: 'CRITICAL' }).map(a => a.id)).toEqual(['ALERT-000002', 'ALERT-000003']);
      expect(store.list({ severity: 'CRITICAL', resolved: false }).map(a => a.id)).toEqual(['ALERT-000003']);
    });

    it('should filter by minimum severity, type, file and recency', () => {
      expect(store.list({ minSeverity: 'WARNING' }).map(a => a.id)).toEqual(['ALERT-000002', 'ALERT-000003']);
      expect(store.list({ type: 'scan_error' }).map(a => a.id)).toEqual(['ALERT-000001']);
      expect(store.list({ filePath: 'src/other.ts' }).map(a => a.id)).toEqual(['ALERT-000002']);
      expect(store.list({ since: new Date('2026-02-02T00:00:00.000Z') }).map(a => a.id)).toEqual(['ALERT-000003']);
    });

    it('should order IDs numerically past six digits', async () => {
      await store.put(makeAlert('ALERT-1000000'));
      await store.put(makeAlert('ALERT-999999'));

      expect(store.list().map(a => a.id)).toEqual([
        'ALERT-000001', 'ALERT-000002', 'ALERT-000003', 'ALERT-999999', 'ALERT-1000000'
      ]);
      expect(compareAlertIds('ALERT-999999', 'ALERT-1000000')).toBeLessThan(0);
    });

    it('should move an alert between severity buckets when it changes', async () => {
      await store.put(makeAlert('ALERT-000001', { severity: 'CRITICAL', type: 'scan_error' }));

      expect(store.list({ severity: 'INFO' })).toEqual([]);
      expect(store.list({ severity: 'CRITICAL', resolved: false }).map(a => a.id)).toEqual(['ALERT-000001', 'ALERT-000003']);
    });
  });

  describe('persistence', () => {
    it('should write and reload alerts and the ID sequence', async () => {
      const store = new AlertStore({ filePath });
      await store.exclusive(async () => {
        await store.put(makeAlert(store.allocateId()));
        await store.put(makeAlert(store.allocateId()));
      });

      const reloaded = new AlertStore({ filePath });
      await reloaded.load();

      expect(reloaded.size()).toBe(2);
      expect(reloaded.allocateId()).toBe('ALERT-000003');

      const written = JSON.parse(await fs.readFile(filePath, 'utf-8'));
      expect(written.version).toBe(1);
      expect(written.nextSequence).toBe(3);
    });

    it('should forget a new alert whose write failed', async () => {
      const blocker = path.join(testDir, 'blocker');
      await fs.writeFile(blocker, 'not a directory');
      const store = new AlertStore({ filePath: path.join(blocker, 'alerts.json') });

      const id = store.allocateId();
      await expect(store.put(makeAlert(id, { fingerprint: 'same' }))).rejects.toBeInstanceOf(StorageError);

      expect(store.get(id)).toBeNull();
      expect(store.findOpenByFingerprint('same')).toBeNull();
      expect(store.list()).toEqual([]);
      expect(store.allocateId()).toBe('ALERT-000001');
    });

    it('should restore the previous version when an update cannot be written', async () => {
      const store = new AlertStore({ filePath });
      await store.put(makeAlert('ALERT-000001', { fingerprint: 'same' }));

      await fs.rm(path.dirname(filePath), { recursive: true, force: true });
      await fs.writeFile(path.dirname(filePath), 'not a directory');

      await expect(store.put(makeAlert('ALERT-000001', { fingerprint: 'same', resolved: true, severity: 'CRITICAL' })))
        .rejects.toBeInstanceOf(StorageError);

      expect(store.get('ALERT-000001')?.resolved).toBe(false);
      expect(store.findOpenByFingerprint('same')?.id).toBe('ALERT-000001');
      expect(store.list({ severity: 'CRITICAL' })).toEqual([]);
      expect(store.list({ severity: 'WARNING', resolved: false }).map(a => a.id)).toEqual(['ALERT-000001']);
    });

    it('should start empty when the file does not exist', async () => {
      const store = new AlertStore({ filePath });
      await store.load();
      expect(store.size()).toBe(0);
    });

    it('should reject a corrupt file', async () => {
      await fs.mkdir(path.dirname(filePath), { recursive: true });
      await fs.writeFile(filePath, '{ not json');

      await expect(new AlertStore({ filePath }).load()).rejects.toBeInstanceOf(StorageError);
    });

    it('should reject a file with the wrong shape', async () => {
      await fs.mkdir(path.dirname(filePath), { recursive: true });
      await fs.writeFile(filePath, JSON.stringify({ version: 1, nextSequence: 1, alerts: [{ id: 'bad' }] }));

      await expect(new AlertStore({ filePath }).load()).rejects.toThrow('Alert store is invalid');
    });
  });

  describe('exclusive', () => {
    it('should serialize read-modify-write sections', async () => {
      const store = new AlertStore();
      await store.put(makeAlert('ALERT-000001'));

      const bump = () => store.exclusive(async () => {
        const current = store.get('ALERT-000001');
        if (!current) throw new Error('missing');
        await new Promise(resolve => setTimeout(resolve, 1));
        await store.put({ ...current, occurrenceCount: current.occurrenceCount + 1 });
      });

      await Promise.all([bump(), bump(), bump()]);

      expect(store.get('ALERT-000001')?.occurrenceCount).toBe(4);
    });
  });
});
