import { randomUUID } from "node:crypto";

import { z } from "zod";

import { describeError, InvalidInputError, NotFoundError } from "../errors.js";
import { KeyedMutex } from "../infra/keyedMutex.js";
import { applyMapChanges } from "../infra/mapChanges.js";
import { JsonSnapshotFile } from "../infra/snapshotFile.js";
import type { StructuredLogger } from "../logger.js";
import { ERROR_CODES } from "../types.js";

/** Durable record of persistent knowledge. */
export interface MemoryRecord {
  readonly id: string;
  readonly title: string;
  readonly content: string;
  readonly tags: readonly string[];
  readonly corpusNames: readonly string[];
  readonly createdAt: number;
  readonly updatedAt: number;
  /** `true` when the user explicitly asked for the memory, `false` for system captures. */
  readonly userTriggered: boolean;
}

export interface MemoryRecordInput {
  title: string;
  content: string;
  tags?: Iterable<string>;
  corpusNames?: Iterable<string>;
  userTriggered?: boolean;
}

/** Fields present in the patch replace the stored ones; absent fields are kept. */
export interface MemoryPatch {
  title?: string;
  content?: string;
  tags?: Iterable<string>;
  corpusNames?: Iterable<string>;
  userTriggered?: boolean;
}

export interface MemorySearchOptions {
  /** Only records listing this corpus name. */
  corpus?: string;
  limit?: number;
}

interface StoredRecord extends MemoryRecord {
  /** Creation order, used as the final tie-break. */
  readonly ordinal: number;
}

const StoredRecordSchema = z.object({
  id: z.string().min(1),
  title: z.string(),
  content: z.string(),
  tags: z.array(z.string()),
  corpusNames: z.array(z.string()),
  createdAt: z.number(),
  updatedAt: z.number(),
  userTriggered: z.boolean(),
  ordinal: z.number().int().nonnegative(),
});

export const MemorySnapshotSchema = z.object({
  version: z.literal(1),
  records: z.array(StoredRecordSchema),
});
export type MemorySnapshot = z.infer<typeof MemorySnapshotSchema>;

/**
 * Canonical tag form: trimmed, lowercased, runs of whitespace or hyphens
 * collapsed to a single underscore.
 */
export function normaliseTag(tag: string): string {
  return tag.trim().toLowerCase().replace(/[\s-]+/g, "_");
}

/** Normalises and deduplicates tags, dropping empty ones. Order of first occurrence is kept. */
export function normaliseTags(tags: Iterable<string> | undefined): string[] {
  const unique = new Set<string>();
  for (const tag of tags ?? []) {
    const normalised = normaliseTag(tag);
    if (normalised.length > 0) {
      unique.add(normalised);
    }
  }
  return Array.from(unique);
}

function dedupeNames(names: Iterable<string> | undefined): string[] {
  const unique = new Set<string>();
  for (const name of names ?? []) {
    const trimmed = name.trim();
    if (trimmed.length > 0) {
      unique.add(trimmed);
    }
  }
  return Array.from(unique);
}

/** Distinct lowercase whitespace-separated terms of a query. */
export function queryTerms(queryText: string): string[] {
  return Array.from(new Set(queryText.toLowerCase().split(/\s+/).filter((term) => term.length > 0)));
}

function countOccurrences(haystack: string, needle: string): number {
  let count = 0;
  let index = haystack.indexOf(needle);
  while (index !== -1) {
    count += 1;
    index = haystack.indexOf(needle, index + needle.length);
  }
  return count;
}

interface ScoredRecord {
  record: StoredRecord;
  tagOverlap: number;
  textMatches: number;
}

function compareRecency(a: StoredRecord, b: StoredRecord): number {
  return b.updatedAt - a.updatedAt || b.ordinal - a.ordinal;
}

function toPublic(record: StoredRecord): MemoryRecord {
  return {
    id: record.id,
    title: record.title,
    content: record.content,
    tags: [...record.tags],
    corpusNames: [...record.corpusNames],
    createdAt: record.createdAt,
    updatedAt: record.updatedAt,
    userTriggered: record.userTriggered,
  };
}

export interface MemoryStoreOptions {
  /** JSON snapshot rewritten after every mutation. */
  snapshotPath?: string;
  now?: () => number;
  idFactory?: () => string;
  logger?: StructuredLogger;
}

/**
 * Key-to-record store with tag-ranked retrieval. Records are immutable values
 * replaced on every write, so a search started before a write keeps iterating
 * over the records it captured. Writes are serialised per identifier.
 */
export class MemoryStore {
  private readonly records = new Map<string, StoredRecord>();
  private readonly mutex = new KeyedMutex();
  private readonly snapshot: JsonSnapshotFile<MemorySnapshot> | null;
  private readonly now: () => number;
  private readonly idFactory: () => string;
  private readonly logger?: StructuredLogger;
  private nextOrdinal = 0;

  constructor(options: MemoryStoreOptions = {}) {
    this.snapshot = options.snapshotPath ? new JsonSnapshotFile(options.snapshotPath, MemorySnapshotSchema) : null;
    this.now = options.now ?? (() => Date.now());
    this.idFactory = options.idFactory ?? (() => randomUUID());
    this.logger = options.logger;
  }

  /** Restores the records persisted in the snapshot file, if any. */
  async load(): Promise<number> {
    if (!this.snapshot) {
      return 0;
    }
    const document = await this.snapshot.load();
    this.records.clear();
    for (const record of document?.records ?? []) {
      this.records.set(record.id, Object.freeze({ ...record }));
      this.nextOrdinal = Math.max(this.nextOrdinal, record.ordinal + 1);
    }
    this.logger?.info("memory_store_loaded", { records: this.records.size, path: this.snapshot.filePath });
    return this.records.size;
  }

  size(): number {
    return this.records.size;
  }

  get(id: string): MemoryRecord | undefined {
    const record = this.records.get(id);
    return record ? toPublic(record) : undefined;
  }

  /** Every record, most recently updated first. */
  list(): MemoryRecord[] {
    return Array.from(this.records.values()).sort(compareRecency).map(toPublic);
  }

  async create(input: MemoryRecordInput): Promise<MemoryRecord> {
    const id = this.idFactory();
    return this.mutex.runExclusive(id, async () => {
      if (this.records.has(id)) {
        throw new InvalidInputError(ERROR_CODES.MEMORY_INVALID_INPUT, `memory id '${id}' already exists`, { id });
      }
      const timestamp = this.now();
      const record: StoredRecord = Object.freeze({
        id,
        title: input.title,
        content: input.content,
        tags: normaliseTags(input.tags),
        corpusNames: dedupeNames(input.corpusNames),
        createdAt: timestamp,
        updatedAt: timestamp,
        userTriggered: input.userTriggered ?? false,
        ordinal: this.nextOrdinal++,
      });
      await this.commit([[id, record]]);
      this.logger?.info("memory_created", { id, tags: record.tags.length, user_triggered: record.userTriggered });
      return toPublic(record);
    });
  }

  /**
   * Ranks records against the query. Primary key: number of record tags found
   * in the query tags plus the normalised query terms. Secondary key: total
   * occurrences of the distinct query terms in title and content. Ties go to
   * the most recently updated, then most recently created record. Records
   * scoring zero on both keys are left out, except that an empty query
   * without tags lists every record.
   *
   * The result is lazy and restartable: each iteration ranks the records
   * captured when `search` was called.
   */
  search(queryText: string, tags?: Iterable<string>, options: MemorySearchOptions = {}): Iterable<MemoryRecord> {
    const captured = Array.from(this.records.values());
    const terms = queryTerms(queryText);
    const queryTags = new Set([...normaliseTags(tags), ...normaliseTags(terms)]);
    const listAll = terms.length === 0 && queryTags.size === 0;
    const corpus = options.corpus?.trim();
    const limit = options.limit === undefined ? Number.POSITIVE_INFINITY : Math.max(0, Math.trunc(options.limit));

    return {
      *[Symbol.iterator]() {
        const scored: ScoredRecord[] = [];
        for (const record of captured) {
          if (corpus && !record.corpusNames.includes(corpus)) {
            continue;
          }
          const tagOverlap = record.tags.filter((tag) => queryTags.has(tag)).length;
          const haystack = `${record.title}\n${record.content}`.toLowerCase();
          const textMatches = terms.reduce((sum, term) => sum + countOccurrences(haystack, term), 0);
          if (!listAll && tagOverlap === 0 && textMatches === 0) {
            continue;
          }
          scored.push({ record, tagOverlap, textMatches });
        }
        scored.sort(
          (a, b) =>
            b.tagOverlap - a.tagOverlap || b.textMatches - a.textMatches || compareRecency(a.record, b.record),
        );
        let yielded = 0;
        for (const entry of scored) {
          if (yielded >= limit) {
            return;
          }
          yielded += 1;
          yield toPublic(entry.record);
        }
      },
    };
  }

  /** Applies the fields present in `patch`. Concurrent updates are last-writer-wins. */
  async update(id: string, patch: MemoryPatch): Promise<MemoryRecord> {
    return this.mutex.runExclusive(id, async () => {
      const current = this.require(id);
      const next: StoredRecord = Object.freeze({
        ...current,
        title: patch.title ?? current.title,
        content: patch.content ?? current.content,
        tags: patch.tags === undefined ? current.tags : normaliseTags(patch.tags),
        corpusNames: patch.corpusNames === undefined ? current.corpusNames : dedupeNames(patch.corpusNames),
        userTriggered: patch.userTriggered ?? current.userTriggered,
        updatedAt: this.now(),
      });
      await this.commit([[id, next]]);
      this.logger?.info("memory_updated", { id, fields: Object.keys(patch) });
      return toPublic(next);
    });
  }

  /**
   * Folds two records into the earlier-created one. Tags and corpus names are
   * unioned, the later record's content is appended under a provenance line
   * and the later record is deleted.
   */
  async merge(idA: string, idB: string): Promise<MemoryRecord> {
    if (idA === idB) {
      throw new InvalidInputError(ERROR_CODES.MEMORY_INVALID_INPUT, "a memory cannot be merged with itself", { id: idA });
    }
    return this.mutex.runExclusive([idA, idB], async () => {
      const a = this.require(idA);
      const b = this.require(idB);
      const [kept, absorbed] = a.ordinal <= b.ordinal ? [a, b] : [b, a];
      const merged: StoredRecord = Object.freeze({
        ...kept,
        content: `${kept.content}\n\n--- merged from ${absorbed.id} (${absorbed.title}) ---\n${absorbed.content}`,
        tags: normaliseTags([...kept.tags, ...absorbed.tags]),
        corpusNames: dedupeNames([...kept.corpusNames, ...absorbed.corpusNames]),
        userTriggered: kept.userTriggered || absorbed.userTriggered,
        updatedAt: this.now(),
      });
      await this.commit([
        [kept.id, merged],
        [absorbed.id, null],
      ]);
      this.logger?.info("memory_merged", { kept: kept.id, removed: absorbed.id });
      return toPublic(merged);
    });
  }

  /** Removes the record. Deleting an absent identifier is not an error. */
  async delete(id: string): Promise<boolean> {
    return this.mutex.runExclusive(id, async () => {
      if (!this.records.has(id)) {
        return false;
      }
      await this.commit([[id, null]]);
      this.logger?.info("memory_deleted", { id });
      return true;
    });
  }

  private require(id: string): StoredRecord {
    const record = this.records.get(id);
    if (!record) {
      throw new NotFoundError("memory", id);
    }
    return record;
  }

  /** Applies the changes, undoing them when the snapshot cannot be saved. */
  private async commit(changes: ReadonlyArray<readonly [string, StoredRecord | null]>): Promise<void> {
    const revert = applyMapChanges(this.records, changes);
    try {
      await this.persist();
    } catch (error) {
      revert();
      this.logger?.error("memory_persist_failed", {
        ids: changes.map(([id]) => id),
        message: describeError(error),
      });
      throw error;
    }
  }

  private async persist(): Promise<void> {
    if (!this.snapshot) {
      return;
    }
    const records = Array.from(this.records.values(), (record) => ({
      ...record,
      tags: [...record.tags],
      corpusNames: [...record.corpusNames],
    }));
    await this.snapshot.save({ version: 1, records });
  }
}
