/**
 * Commit history cache
 *
 * A JSON record of the commits created, keyed by commit hash.
 * File: $XDG_CACHE_HOME/scribe/commits.json (~/.cache/scribe/commits.json)
 */

import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'node:fs';
import { homedir } from 'node:os';
import { dirname, join } from 'node:path';
import { z } from 'zod';
import type { Env } from '../llm/types.js';

const CommitRecordSchema = z.object({
  message: z.string(),
  hash: z.string(),
  timestamp: z.string(),
  success: z.boolean(),
});

const HistoryFileSchema = z.record(CommitRecordSchema);

export type CommitRecord = z.infer<typeof CommitRecordSchema>;

/**
 * Get history file path
 */
export function getHistoryPath(env: Env = process.env): string {
  const base = env['XDG_CACHE_HOME'] || join(homedir(), '.cache');
  return join(base, 'scribe', 'commits.json');
}

/**
 * Commit history backed by a JSON file
 */
export class CommitHistory {
  private records: Record<string, CommitRecord> = {};

  constructor(
    readonly path: string = getHistoryPath(),
    private readonly now: () => Date = () => new Date()
  ) {}

  /**
   * Load records from disk
   *
   * A missing file loads as empty.
   *
   * @throws Error if the file exists but is not a valid history file
   */
  load(): void {
    if (!existsSync(this.path)) {
      this.records = {};
      return;
    }

    const content = readFileSync(this.path, 'utf-8');
    const result = HistoryFileSchema.safeParse(JSON.parse(content));
    if (!result.success) {
      throw new Error(`Invalid commit history at ${this.path}`);
    }
    this.records = result.data;
  }

  /**
   * Write records to disk
   */
  save(): void {
    const dir = dirname(this.path);
    if (!existsSync(dir)) {
      mkdirSync(dir, { recursive: true });
    }
    writeFileSync(this.path, JSON.stringify(this.records, null, 2) + '\n', 'utf-8');
  }

  /**
   * Record a commit and persist
   */
  add(message: string, hash: string, success: boolean): CommitRecord {
    const record: CommitRecord = {
      message,
      hash,
      timestamp: this.now().toISOString(),
      success,
    };
    this.records[hash] = record;
    this.save();
    return record;
  }

  get(hash: string): CommitRecord | undefined {
    return this.records[hash];
  }

  /**
   * All records, oldest first
   */
  list(): CommitRecord[] {
    return Object.values(this.records).sort((a, b) => a.timestamp.localeCompare(b.timestamp));
  }
}
