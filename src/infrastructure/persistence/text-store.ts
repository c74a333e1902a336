import { appendFileSync, existsSync, mkdirSync, readFileSync, readdirSync, statSync, writeFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import type { ITextStore } from '@domain/ports/text-store.js';

export class TextStoreError extends Error {
  constructor(
    message: string,
    public readonly path: string,
    public readonly cause?: unknown,
  ) {
    super(message);
    this.name = 'TextStoreError';
  }
}

function reason(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** ITextStore over the local file system (UTF-8). */
export class FileTextStore implements ITextStore {
  read(path: string): string {
    if (!existsSync(path)) {
      throw new TextStoreError(`File does not exist in path: ${path}.`, path);
    }
    try {
      return readFileSync(path, 'utf-8');
    } catch (err) {
      throw new TextStoreError(`Failed to read file ${path}: ${reason(err)}`, path, err);
    }
  }

  exists(path: string): boolean {
    return existsSync(path);
  }

  isDirectory(path: string): boolean {
    return existsSync(path) && statSync(path).isDirectory();
  }

  write(path: string, content: string): void {
    this.ensureDir(dirname(path));
    try {
      writeFileSync(path, content, 'utf-8');
    } catch (err) {
      throw new TextStoreError(`Failed to write file ${path}: ${reason(err)}`, path, err);
    }
  }

  append(path: string, content: string): void {
    this.ensureDir(dirname(path));
    try {
      appendFileSync(path, content, 'utf-8');
    } catch (err) {
      throw new TextStoreError(`Failed to append to file ${path}: ${reason(err)}`, path, err);
    }
  }

  listMarkdown(dir: string): string[] {
    if (!this.isDirectory(dir)) return [];
    const files: string[] = [];
    for (const dirent of readdirSync(dir, { withFileTypes: true })) {
      const path = join(dir, dirent.name);
      if (dirent.isDirectory()) {
        files.push(...this.listMarkdown(path));
      } else if (dirent.isFile() && dirent.name.endsWith('.md')) {
        files.push(path);
      }
    }
    return files.sort();
  }

  private ensureDir(dir: string): void {
    if (existsSync(dir)) return;
    try {
      mkdirSync(dir, { recursive: true });
    } catch (err) {
      throw new TextStoreError(`Failed to create directory ${dir}: ${reason(err)}`, dir, err);
    }
  }
}
