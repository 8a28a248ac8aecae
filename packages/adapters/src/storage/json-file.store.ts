import fs from 'node:fs/promises';
import path from 'node:path';
import { PersistenceError, type Datapoint, type MeasurementStorePort } from '@linetest/domain';
import { PersistedSessionSchema, decodeDatapoint, encodeDatapoint } from './datapoint.codec.js';
import { isLogFile } from './data-dir.js';

function describe(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** Sessions as one JSON array per file. Every save rewrites the whole file. */
export class JsonFileMeasurementStore implements MeasurementStorePort {
  async save(filePath: string, datapoints: readonly Datapoint[]): Promise<void> {
    try {
      await fs.mkdir(path.dirname(filePath), { recursive: true });
      await fs.writeFile(filePath, JSON.stringify(datapoints.map(encodeDatapoint)), 'utf8');
    } catch (err) {
      throw new PersistenceError(`failed to save session: ${describe(err)}`, filePath, { cause: err });
    }
  }

  async load(filePath: string): Promise<Datapoint[]> {
    let raw: unknown;
    try {
      raw = JSON.parse(await fs.readFile(filePath, 'utf8'));
    } catch (err) {
      throw new PersistenceError(`failed to read session: ${describe(err)}`, filePath, { cause: err });
    }

    const parsed = PersistedSessionSchema.safeParse(raw);
    if (!parsed.success) {
      const issues = parsed.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`);
      throw new PersistenceError(`invalid session file: ${issues.join('; ')}`, filePath, {
        cause: parsed.error,
      });
    }
    return parsed.data.map(decodeDatapoint);
  }

  async list(dir: string): Promise<string[]> {
    let entries: string[];
    try {
      entries = await fs.readdir(dir);
    } catch (err) {
      if (err instanceof Error && 'code' in err && err.code === 'ENOENT') return [];
      throw new PersistenceError(`failed to list sessions: ${describe(err)}`, dir, { cause: err });
    }
    return entries
      .filter(isLogFile)
      .sort()
      .map((name) => path.join(dir, name));
  }
}
