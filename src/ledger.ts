import path from 'node:path';
import fs from 'fs-extra';
import { isRecord, readString } from './library.js';

export type LedgerOutcome = 'queued' | 'complete' | 'failed' | 'cancelled';

export interface LedgerEntry {
  readonly outcome: LedgerOutcome;
  readonly itemId?: string;
  readonly source?: string;
  readonly filePath?: string;
  readonly updatedAt: string;
}

/**
 * Record of prior sync outcomes keyed by `service:trackId`.
 */
export interface SyncLedger {
  get(key: string): LedgerEntry | undefined;
  record(key: string, entry: Omit<LedgerEntry, 'updatedAt'>): void;
  flush(): Promise<void>;
}

export const trackKey = (track: { readonly service: string; readonly trackId: string }): string =>
  `${track.service}:${track.trackId}`;

const OUTCOMES: ReadonlySet<string> = new Set<LedgerOutcome>(['queued', 'complete', 'failed', 'cancelled']);

const isOutcome = (value: string | undefined): value is LedgerOutcome => value !== undefined && OUTCOMES.has(value);

export class MemoryLedger implements SyncLedger {
  protected readonly entries = new Map<string, LedgerEntry>();

  get(key: string): LedgerEntry | undefined {
    return this.entries.get(key);
  }

  record(key: string, entry: Omit<LedgerEntry, 'updatedAt'>): void {
    this.entries.set(key, { ...entry, updatedAt: new Date().toISOString() });
  }

  get size(): number {
    return this.entries.size;
  }

  async flush(): Promise<void> {}
}

/**
 * Ledger persisted as a JSON object between runs.
 */
export class JsonFileLedger extends MemoryLedger {
  private constructor(private readonly filePath: string) {
    super();
  }

  static async open(filePath: string): Promise<JsonFileLedger> {
    const ledger = new JsonFileLedger(filePath);
    if (await fs.pathExists(filePath)) {
      const raw: unknown = await fs.readJson(filePath);
      if (isRecord(raw)) {
        for (const [key, value] of Object.entries(raw)) {
          if (!isRecord(value)) {
            continue;
          }
          const outcome = readString(value.outcome);
          if (!isOutcome(outcome)) {
            continue;
          }
          ledger.entries.set(key, {
            outcome,
            itemId: readString(value.itemId),
            source: readString(value.source),
            filePath: readString(value.filePath),
            updatedAt: readString(value.updatedAt) ?? new Date(0).toISOString(),
          });
        }
      }
    }
    return ledger;
  }

  override async flush(): Promise<void> {
    await fs.ensureDir(path.dirname(this.filePath));
    await fs.writeJson(this.filePath, Object.fromEntries(this.entries), { spaces: 2 });
  }
}
