import os from 'node:os';
import path from 'node:path';
import fs from 'fs-extra';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { JsonFileLedger, MemoryLedger, trackKey } from './ledger.js';

describe('trackKey', () => {
  it('joins service and track id', () => {
    expect(trackKey({ service: 'spotify', trackId: 'abc' })).toBe('spotify:abc');
  });
});

describe('MemoryLedger', () => {
  it('keeps the latest outcome per key', () => {
    const ledger = new MemoryLedger();
    ledger.record('spotify:abc', { outcome: 'queued', itemId: 'item-1' });
    ledger.record('spotify:abc', { outcome: 'complete', itemId: 'item-1', filePath: '/music/a.mp3' });

    expect(ledger.size).toBe(1);
    expect(ledger.get('spotify:abc')).toMatchObject({ outcome: 'complete', filePath: '/music/a.mp3' });
    expect(ledger.get('spotify:missing')).toBeUndefined();
  });
});

describe('JsonFileLedger', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'ledger-test-'));
  });

  afterEach(async () => {
    await fs.remove(dir);
  });

  it('starts empty when the file does not exist', async () => {
    const ledger = await JsonFileLedger.open(path.join(dir, 'ledger.json'));
    expect(ledger.size).toBe(0);
  });

  it('persists entries across opens', async () => {
    const filePath = path.join(dir, 'state', 'ledger.json');
    const ledger = await JsonFileLedger.open(filePath);
    ledger.record('spotify:abc', { outcome: 'complete', source: 'https://www.youtube.com/watch?v=abcdefghijk' });
    await ledger.flush();

    const reopened = await JsonFileLedger.open(filePath);
    expect(reopened.get('spotify:abc')).toMatchObject({
      outcome: 'complete',
      source: 'https://www.youtube.com/watch?v=abcdefghijk',
      itemId: undefined,
    });
  });

  it('drops entries with an unknown outcome', async () => {
    const filePath = path.join(dir, 'ledger.json');
    await fs.writeJson(filePath, {
      'spotify:good': { outcome: 'failed', updatedAt: '2024-01-01T00:00:00.000Z' },
      'spotify:bad': { outcome: 'exploded' },
      'spotify:worse': 'nope',
    });

    const ledger = await JsonFileLedger.open(filePath);
    expect(ledger.size).toBe(1);
    expect(ledger.get('spotify:good')).toEqual({
      outcome: 'failed',
      itemId: undefined,
      source: undefined,
      filePath: undefined,
      updatedAt: '2024-01-01T00:00:00.000Z',
    });
  });
});
