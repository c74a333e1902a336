import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'node:fs';
import { dirname } from 'node:path';
import type { z } from 'zod/v4';

export type JsonFileErrorKind = 'missing' | 'unreadable' | 'syntax' | 'schema';

export class JsonFileError extends Error {
  constructor(
    message: string,
    public readonly path: string,
    public readonly kind: JsonFileErrorKind,
    public readonly cause?: unknown,
  ) {
    super(message);
    this.name = 'JsonFileError';
  }
}

interface Issue {
  path: readonly PropertyKey[];
  message: string;
}

function formatIssues(issues: readonly Issue[]): string {
  return issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.map(String).join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

/**
 * Read a JSON file and validate it, applying the schema's defaults.
 * @throws JsonFileError tagged with what went wrong
 */
export function readJsonFile<T>(path: string, schema: z.ZodType<T>): T {
  if (!existsSync(path)) {
    throw new JsonFileError(`File not found: ${path}`, path, 'missing');
  }

  let raw: string;
  try {
    raw = readFileSync(path, 'utf-8');
  } catch (err) {
    throw new JsonFileError(`Failed to read file: ${path}`, path, 'unreadable', err);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    throw new JsonFileError(`Invalid JSON in file: ${path}`, path, 'syntax', err);
  }

  const result = schema.safeParse(parsed);
  if (!result.success) {
    throw new JsonFileError(`Invalid settings in ${path}: ${formatIssues(result.error.issues)}`, path, 'schema', result.error);
  }
  return result.data;
}

/** Validate and write pretty-printed JSON, creating parent directories. */
export function writeJsonFile<T>(path: string, data: T, schema: z.ZodType<T>): void {
  const result = schema.safeParse(data);
  if (!result.success) {
    throw new JsonFileError(`Refusing to write invalid data: ${formatIssues(result.error.issues)}`, path, 'schema', result.error);
  }
  mkdirSync(dirname(path), { recursive: true });
  writeFileSync(path, JSON.stringify(result.data, null, 2) + '\n', 'utf-8');
}
