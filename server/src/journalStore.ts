import fs from "fs/promises";
import path from "path";
import { PersistenceError } from "./errors";
import { createWriteQueue, readTextFile } from "./dataStore";
import { journalLineSchema, SCHEMA_VERSION, sessionRecordSchema } from "./schemas";
import type { SessionRecord } from "./types";

export interface JournalLoadResult {
  records: SessionRecord[];
  skipped: number;
}

export interface JournalStore {
  readonly filePath: string;
  append(record: SessionRecord): Promise<void>;
  loadAll(): Promise<JournalLoadResult>;
}

export function serializeRecord(record: SessionRecord) {
  return JSON.stringify({ schemaVersion: SCHEMA_VERSION, record });
}

/** Parses one journal line, or returns null when the line cannot be salvaged. */
export function parseJournalLine(line: string): SessionRecord | null {
  let raw: unknown;
  try {
    raw = JSON.parse(line);
  } catch {
    return null;
  }
  const parsed = journalLineSchema.safeParse(raw);
  return parsed.success ? parsed.data.record : null;
}

function byStartTime(a: SessionRecord, b: SessionRecord) {
  return Date.parse(a.timestamp.wallClock) - Date.parse(b.timestamp.wallClock);
}

export function createJournalStore(dataDir: string, fileName = "journal.jsonl"): JournalStore {
  const filePath = path.join(dataDir, fileName);
  const queueWrite = createWriteQueue();

  return {
    filePath,
    async append(record) {
      const checked = sessionRecordSchema.safeParse(record);
      if (!checked.success) {
        throw new PersistenceError(`Refusing to journal malformed record ${record.id}`, filePath, checked.error);
      }
      await queueWrite(async () => {
        try {
          await fs.appendFile(filePath, `${serializeRecord(checked.data)}\n`, "utf-8");
        } catch (error) {
          throw new PersistenceError(`Cannot append to ${fileName}`, filePath, error);
        }
      });
    },
    async loadAll() {
      const raw = await readTextFile(filePath);
      if (raw === null) return { records: [], skipped: 0 };

      const records: SessionRecord[] = [];
      let skipped = 0;
      for (const line of raw.split("\n")) {
        if (!line.trim()) continue;
        const record = parseJournalLine(line);
        if (record) records.push(record);
        else skipped++;
      }
      if (skipped > 0) {
        console.warn(`${fileName}: skipped ${skipped} malformed entr${skipped === 1 ? "y" : "ies"}, salvaged ${records.length}`);
      }
      // Array.prototype.sort is stable, so records sharing a start time keep append order.
      return { records: records.sort(byStartTime), skipped };
    }
  };
}
