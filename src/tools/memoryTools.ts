import { z } from "zod";

import type { StructuredLogger } from "../logger.js";
import type { MemoryRecord, MemoryStore } from "../memory/store.js";

/** Context injected when serving memory-oriented operations. */
export interface MemoryToolContext {
  store: MemoryStore;
  logger: StructuredLogger;
}

const TagListSchema = z.array(z.string().min(1).max(128)).max(64);
const CorpusListSchema = z.array(z.string().min(1).max(256)).max(32);

export const CreateMemoryInputSchema = z
  .object({
    title: z.string().min(1, "title must not be empty").max(512),
    content: z.string().max(200_000),
    tags: TagListSchema.default([]),
    corpusNames: CorpusListSchema.default([]),
    userTriggered: z.boolean().default(false),
  })
  .strict();
export const CreateMemoryInputShape = CreateMemoryInputSchema.shape;

export const SearchMemoryInputSchema = z
  .object({
    query: z.string().max(4_096),
    tags: TagListSchema.optional(),
    corpus: z.string().min(1).optional(),
    limit: z.number().int().min(1).max(500).optional(),
  })
  .strict();
export const SearchMemoryInputShape = SearchMemoryInputSchema.shape;

const MemoryPatchSchema = z
  .object({
    title: z.string().min(1).max(512).optional(),
    content: z.string().max(200_000).optional(),
    tags: TagListSchema.optional(),
    corpusNames: CorpusListSchema.optional(),
    userTriggered: z.boolean().optional(),
  })
  .strict();

export const UpdateMemoryInputSchema = z
  .object({
    id: z.string().min(1),
    patch: MemoryPatchSchema,
  })
  .strict();
export const UpdateMemoryInputShape = UpdateMemoryInputSchema.shape;

export const MergeMemoryInputSchema = z
  .object({
    primaryId: z.string().min(1),
    secondaryId: z.string().min(1),
  })
  .strict();
export const MergeMemoryInputShape = MergeMemoryInputSchema.shape;

export const DeleteMemoryInputSchema = z.object({ id: z.string().min(1) }).strict();
export const DeleteMemoryInputShape = DeleteMemoryInputSchema.shape;

/** JSON form of a record returned to clients. */
export interface MemoryRecordPayload {
  id: string;
  title: string;
  content: string;
  tags: string[];
  corpusNames: string[];
  createdAt: string;
  updatedAt: string;
  userTriggered: boolean;
}

export function serialiseMemoryRecord(record: MemoryRecord): MemoryRecordPayload {
  return {
    id: record.id,
    title: record.title,
    content: record.content,
    tags: [...record.tags],
    corpusNames: [...record.corpusNames],
    createdAt: new Date(record.createdAt).toISOString(),
    updatedAt: new Date(record.updatedAt).toISOString(),
    userTriggered: record.userTriggered,
  };
}

export async function handleCreateMemory(
  context: MemoryToolContext,
  input: z.infer<typeof CreateMemoryInputSchema>,
): Promise<{ record: MemoryRecordPayload }> {
  const record = await context.store.create(input);
  return { record: serialiseMemoryRecord(record) };
}

export function handleSearchMemory(
  context: MemoryToolContext,
  input: z.infer<typeof SearchMemoryInputSchema>,
): { records: MemoryRecordPayload[]; total: number } {
  const started = Date.now();
  const records = Array.from(
    context.store.search(input.query, input.tags, { corpus: input.corpus, limit: input.limit }),
    serialiseMemoryRecord,
  );
  context.logger.info("memory_search", {
    query_length: input.query.length,
    tags: input.tags?.length ?? 0,
    returned: records.length,
    took_ms: Date.now() - started,
  });
  return { records, total: records.length };
}

export async function handleUpdateMemory(
  context: MemoryToolContext,
  input: z.infer<typeof UpdateMemoryInputSchema>,
): Promise<{ record: MemoryRecordPayload }> {
  const record = await context.store.update(input.id, input.patch);
  return { record: serialiseMemoryRecord(record) };
}

export async function handleMergeMemory(
  context: MemoryToolContext,
  input: z.infer<typeof MergeMemoryInputSchema>,
): Promise<{ record: MemoryRecordPayload; removedId: string }> {
  const record = await context.store.merge(input.primaryId, input.secondaryId);
  const removedId = record.id === input.primaryId ? input.secondaryId : input.primaryId;
  return { record: serialiseMemoryRecord(record), removedId };
}

export async function handleDeleteMemory(
  context: MemoryToolContext,
  input: z.infer<typeof DeleteMemoryInputSchema>,
): Promise<{ id: string; deleted: boolean }> {
  const deleted = await context.store.delete(input.id);
  return { id: input.id, deleted };
}
