/**
 * 本地 JSON 快照
 *
 * 写入先落到临时文件再 rename，避免半写文件覆盖旧快照
 */

import { mkdir, readFile, rename, writeFile } from 'fs/promises';
import path from 'path';
import { WordMemoSnapshotSchema, type WordMemoSnapshot } from '@wordmemo/shared';
import { AppError } from '../errors';
import { storeLogger } from '../logger';

export interface SnapshotStore {
  load(): Promise<WordMemoSnapshot | null>;
  save(snapshot: WordMemoSnapshot): Promise<void>;
}

export class JsonSnapshotStore implements SnapshotStore {
  constructor(private readonly filePath: string) {}

  /**
   * 读取快照，文件不存在时返回 null
   */
  async load(): Promise<WordMemoSnapshot | null> {
    let raw: string;
    try {
      raw = await readFile(this.filePath, 'utf8');
    } catch (error) {
      if (isNotFound(error)) {
        storeLogger.info({ file: this.filePath }, 'snapshot file not found, starting empty');
        return null;
      }
      throw error;
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (error) {
      storeLogger.error({ err: error, file: this.filePath }, 'snapshot is not valid JSON');
      throw AppError.snapshotInvalid(`快照文件不是合法 JSON: ${this.filePath}`);
    }

    const parsed = WordMemoSnapshotSchema.safeParse(json);
    if (!parsed.success) {
      const first = parsed.error.errors[0];
      throw AppError.snapshotInvalid(
        `快照文件格式错误: ${first?.path.join('.') ?? ''} ${first?.message ?? ''}`.trim(),
      );
    }
    return parsed.data;
  }

  async save(snapshot: WordMemoSnapshot): Promise<void> {
    const tempPath = `${this.filePath}.tmp`;
    await mkdir(path.dirname(this.filePath), { recursive: true });
    await writeFile(tempPath, JSON.stringify(snapshot, null, 2), 'utf8');
    await rename(tempPath, this.filePath);
    storeLogger.debug({ file: this.filePath, lists: snapshot.lists.length }, 'snapshot saved');
  }
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
