import { mkdir, readFile, rename, rm, writeFile } from 'node:fs/promises';
import * as path from 'node:path';
import { formatZodIssues } from '@ces/config';
import {
  type CursorPosition,
  DeserializeError,
  FileSystemError,
  ResultStore,
  type ScanStatePort,
} from '@ces/domain';
import { CURSOR_FILE_NAME, RESULT_FILE_NAME } from '@ces/scanner/infrastructure/constants';
import { z } from 'zod';

const cursorSchema = z
  .object({
    rangeIndex: z.number().int().min(0),
    offset: z.number().int().min(0),
  })
  .strict();

/** Result and cursor files in the data directory. Every write replaces the file atomically. */
export class FileScanStateAdapter implements ScanStatePort {
  readonly resultsLocation: string;
  readonly cursorLocation: string;

  constructor(private readonly dataDir: string) {
    this.resultsLocation = path.resolve(dataDir, RESULT_FILE_NAME);
    this.cursorLocation = path.resolve(dataDir, CURSOR_FILE_NAME);
  }

  async loadResults(): Promise<ResultStore | null> {
    const text = await readIfExists(this.resultsLocation);
    return text === null ? null : ResultStore.fromText(text, this.resultsLocation);
  }

  async saveResults(store: ResultStore): Promise<void> {
    await this.writeAtomic(this.resultsLocation, store.toText());
  }

  async loadCursor(): Promise<CursorPosition | null> {
    const text = await readIfExists(this.cursorLocation);
    if (text === null) {
      return null;
    }
    return parseCursor(text, this.cursorLocation);
  }

  async saveCursor(position: CursorPosition): Promise<void> {
    await this.writeAtomic(this.cursorLocation, `${serializeCursor(position)}\n`);
  }

  private async writeAtomic(filePath: string, content: string): Promise<void> {
    const tempPath = `${filePath}.${process.pid}.tmp`;
    try {
      await mkdir(this.dataDir, { recursive: true });
      await writeFile(tempPath, content, 'utf-8');
      await rename(tempPath, filePath);
    } catch (error) {
      await rm(tempPath, { force: true }).catch(() => undefined);
      throw FileSystemError.from(filePath, error);
    }
  }
}

export function serializeCursor(position: CursorPosition): string {
  return JSON.stringify({ rangeIndex: position.rangeIndex, offset: position.offset });
}

export function parseCursor(text: string, source: string): CursorPosition {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw new DeserializeError(source, (error as Error).message, undefined, { cause: error });
  }

  const result = cursorSchema.safeParse(raw);
  if (!result.success) {
    throw new DeserializeError(source, `invalid cursor\n${formatZodIssues(result.error.issues)}`);
  }
  return result.data;
}

async function readIfExists(filePath: string): Promise<string | null> {
  try {
    return await readFile(filePath, 'utf-8');
  } catch (error) {
    const ioError = FileSystemError.from(filePath, error);
    if (ioError.isNotFound) {
      return null;
    }
    throw ioError;
  }
}
