import path from "path";
import { z } from "zod";
import { NotFoundError, PersistenceError } from "./errors";
import { createWriteQueue, readJsonFile, writeJsonAtomic } from "./dataStore";
import { SCHEMA_VERSION } from "./schemas";

export interface CollectionStore<T extends { id: string }> {
  load(): Promise<{ items: T[]; skipped: number }>;
  list(): readonly T[];
  get(id: string): T | undefined;
  insert(item: T): Promise<T>;
  update(id: string, change: (current: T) => T): Promise<T>;
  remove(id: string): Promise<T>;
}

/**
 * A small keyed collection kept in memory and mirrored to `<name>.json`.
 * Readers get an immutable snapshot; every mutation runs inside the collection's
 * write queue and swaps the snapshot only after the file has been written.
 */
export function createCollectionStore<T extends { id: string }>(
  dataDir: string,
  name: string,
  itemSchema: z.ZodType<T, z.ZodTypeDef, unknown>
): CollectionStore<T> {
  const filePath = path.join(dataDir, `${name}.json`);
  const queueWrite = createWriteQueue();
  let snapshot: readonly T[] = [];

  const fileSchema = z.object({ schemaVersion: z.number().int().min(1), items: z.array(z.unknown()) });

  async function commit(next: T[]) {
    await writeJsonAtomic(filePath, { schemaVersion: SCHEMA_VERSION, items: next });
    snapshot = Object.freeze(next);
  }

  function indexOf(items: readonly T[], id: string) {
    const idx = items.findIndex((item) => item.id === id);
    if (idx < 0) throw new NotFoundError(name.replace(/s$/, ""), id);
    return idx;
  }

  return {
    async load() {
      const raw = await readJsonFile(filePath);
      if (raw === undefined) {
        snapshot = Object.freeze([]);
        return { items: [], skipped: 0 };
      }
      const file = fileSchema.safeParse(raw);
      if (!file.success) throw new PersistenceError(`${name}.json has an unrecognised layout`, filePath, file.error);

      const items: T[] = [];
      let skipped = 0;
      for (const entry of file.data.items) {
        const parsed = itemSchema.safeParse(entry);
        if (parsed.success) items.push(parsed.data);
        else skipped++;
      }
      if (skipped > 0) console.warn(`${name}.json: skipped ${skipped} malformed item(s)`);
      snapshot = Object.freeze(items);
      return { items: [...items], skipped };
    },
    list: () => snapshot,
    get: (id) => snapshot.find((item) => item.id === id),
    insert(item) {
      return queueWrite(async () => {
        await commit([...snapshot, item]);
        return item;
      });
    },
    update(id, change) {
      return queueWrite(async () => {
        const idx = indexOf(snapshot, id);
        const next = [...snapshot];
        next[idx] = change(snapshot[idx]);
        await commit(next);
        return next[idx];
      });
    },
    remove(id) {
      return queueWrite(async () => {
        const idx = indexOf(snapshot, id);
        const removed = snapshot[idx];
        await commit(snapshot.filter((item) => item.id !== id));
        return removed;
      });
    }
  };
}
