import { Injectable, Logger } from '@nestjs/common';
import { mkdir, readFile, rename, writeFile } from 'fs/promises';
import { dirname } from 'path';
import { z } from 'zod';
import type { Snapshot } from '@supplier-watch/shared';
import { WorkerConfigService } from '../config/config.service';

const persistedSnapshotSchema = z.object({
  url: z.string().optional(),
  name: z.string().optional(),
  price: z.number().nullish().transform((value) => value ?? null),
  raw_price: z.string().nullish().transform((value) => value ?? null),
  stock: z.string().nullish().transform((value) => value ?? null),
});

const persistedStateSchema = z.record(z.string(), persistedSnapshotSchema);

type PersistedSnapshot = z.input<typeof persistedSnapshotSchema>;

/**
 * Last known snapshot per product URL.
 *
 * Entries of products no longer configured are kept: this is a cache of
 * last-known values, not a mirror of the configuration.
 */
export class SnapshotState {
  private readonly entries: Map<string, Snapshot>;

  constructor(entries: Iterable<[string, Snapshot]> = []) {
    this.entries = new Map(entries);
  }

  get(url: string): Snapshot | undefined {
    return this.entries.get(url);
  }

  set(url: string, snapshot: Snapshot): void {
    this.entries.set(url, snapshot);
  }

  get size(): number {
    return this.entries.size;
  }

  toJSON(): Record<string, PersistedSnapshot> {
    const state: Record<string, PersistedSnapshot> = {};
    for (const [url, snapshot] of this.entries) {
      state[url] = {
        url: snapshot.url,
        name: snapshot.name,
        price: snapshot.price,
        raw_price: snapshot.rawPrice,
        stock: snapshot.stock,
      };
    }
    return state;
  }
}

function isNotFound(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT';
}

/**
 * JSON file persistence for {@link SnapshotState}.
 * The whole file is rewritten on save, through a temp file and a rename.
 */
@Injectable()
export class StateStoreService {
  private readonly logger = new Logger(StateStoreService.name);

  constructor(private readonly config: WorkerConfigService) {}

  async load(): Promise<SnapshotState> {
    const path = this.config.statePath;

    let content: string;
    try {
      content = await readFile(path, 'utf-8');
    } catch (error) {
      if (isNotFound(error)) {
        this.logger.log(`No state file at ${path}, starting empty`);
        return new SnapshotState();
      }
      throw error;
    }

    let raw: unknown;
    try {
      raw = JSON.parse(content);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new Error(`State file ${path} is not valid JSON: ${message}`);
    }

    const result = persistedStateSchema.safeParse(raw);
    if (!result.success) {
      const errors = result.error.errors.map(err =>
        `${err.path.join('.')}: ${err.message}`
      ).join('\n');
      throw new Error(`State file ${path} is invalid:\n${errors}`);
    }

    const entries = Object.entries(result.data).map(([url, snapshot]): [string, Snapshot] => [
      url,
      {
        // Only price and stock are compared; url and name fall back to the key
        url: snapshot.url ?? url,
        name: snapshot.name ?? url,
        price: snapshot.price,
        rawPrice: snapshot.raw_price,
        stock: snapshot.stock,
      },
    ]);

    this.logger.log(`Loaded ${entries.length} snapshots from ${path}`);
    return new SnapshotState(entries);
  }

  async save(state: SnapshotState): Promise<void> {
    const path = this.config.statePath;
    const tempPath = `${path}.${process.pid}.tmp`;

    await mkdir(dirname(path), { recursive: true });
    await writeFile(tempPath, JSON.stringify(state, null, 2) + '\n', 'utf-8');
    await rename(tempPath, path);

    this.logger.log(`Saved ${state.size} snapshots to ${path}`);
  }
}
