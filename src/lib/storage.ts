import fs from 'node:fs';
import path from 'node:path';
import type { Annotation, AnnotationSet } from '@/types';
import { PersistenceError } from '@/lib/errors';
import { log } from '@/lib/logger';

/**
 * Persisted representation of annotation sets, one entry per image key.
 * Implementations throw `PersistenceError` on I/O failure.
 */
export interface AnnotationBackend {
  /** Stored set for `key`, or null when nothing is stored */
  read(key: string): AnnotationSet | null;
  write(key: string, annotations: AnnotationSet): void;
  /** Remove the stored set; no-op when absent */
  remove(key: string): void;
  exists(key: string): boolean;
}

/** Image key for an image path: its base filename without extension */
export function imageKeyFromPath(imagePath: string): string {
  return path.parse(imagePath).name;
}

function readNumber(record: Record<string, unknown>, field: string): number {
  const value = record[field];
  return typeof value === 'number' && Number.isFinite(value) ? value : 0;
}

/** Parse one persisted record; missing or non-numeric fields default to 0 */
export function annotationFromRecord(value: unknown): Annotation {
  const record: Record<string, unknown> =
    typeof value === 'object' && value !== null ? Object.fromEntries(Object.entries(value)) : {};
  return {
    x: readNumber(record, 'x'),
    y: readNumber(record, 'y'),
    width: readNumber(record, 'width'),
    height: readNumber(record, 'height'),
    class_id: Math.trunc(readNumber(record, 'class_id')),
  };
}

function annotationToRecord(annotation: Annotation): Annotation {
  return {
    x: annotation.x,
    y: annotation.y,
    width: annotation.width,
    height: annotation.height,
    class_id: annotation.class_id,
  };
}

/**
 * Stores each set as a pretty-printed JSON array at `<dir>/<key>.json`.
 * All operations are synchronous.
 */
export class FileBackend implements AnnotationBackend {
  constructor(readonly directory: string) {}

  pathFor(key: string): string {
    return path.join(this.directory, `${key}.json`);
  }

  read(key: string): AnnotationSet | null {
    const file = this.pathFor(key);
    let text: string;
    try {
      text = fs.readFileSync(file, 'utf-8');
    } catch (err) {
      if (isNotFound(err)) return null;
      throw new PersistenceError('read', key, { cause: err });
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(text);
    } catch (err) {
      log.error(`Corrupt annotation file ${file}, treating as empty:`, err);
      return [];
    }
    if (!Array.isArray(parsed)) {
      log.error(`Annotation file ${file} does not hold a list, treating as empty`);
      return [];
    }
    return parsed.map(annotationFromRecord);
  }

  write(key: string, annotations: AnnotationSet): void {
    try {
      fs.mkdirSync(this.directory, { recursive: true });
      fs.writeFileSync(
        this.pathFor(key),
        JSON.stringify(annotations.map(annotationToRecord), null, 2),
        'utf-8'
      );
    } catch (err) {
      throw new PersistenceError('write', key, { cause: err });
    }
  }

  remove(key: string): void {
    try {
      fs.rmSync(this.pathFor(key), { force: true });
    } catch (err) {
      throw new PersistenceError('remove', key, { cause: err });
    }
  }

  exists(key: string): boolean {
    return fs.existsSync(this.pathFor(key));
  }
}

function isNotFound(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

/** Keeps sets in process memory; used by tests and embedders without a file system */
export class MemoryBackend implements AnnotationBackend {
  private readonly entries = new Map<string, AnnotationSet>();

  read(key: string): AnnotationSet | null {
    const stored = this.entries.get(key);
    return stored ? stored.map((a) => ({ ...a })) : null;
  }

  write(key: string, annotations: AnnotationSet): void {
    this.entries.set(key, annotations.map((a) => ({ ...a })));
  }

  remove(key: string): void {
    this.entries.delete(key);
  }

  exists(key: string): boolean {
    return this.entries.has(key);
  }

  keys(): string[] {
    return [...this.entries.keys()];
  }
}
