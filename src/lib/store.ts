import type { AnnotationSet, AnnotationStatistics, ImportResult } from '@/types';
import type { EngineConfig } from '@/lib/config';
import { MalformedRecordError } from '@/lib/errors';
import {
  assertImageDimensions,
  formatNormalizedLine,
  fromNormalized,
  parseNormalizedLine,
  toNormalized,
} from '@/lib/geometry';
import { log } from '@/lib/logger';
import { FileBackend, type AnnotationBackend } from '@/lib/storage';

function copySet(annotations: AnnotationSet): AnnotationSet {
  return annotations.map((a) => ({ ...a }));
}

/**
 * Authoritative holder of annotation sets keyed by image, with write-through
 * persistence to an {@link AnnotationBackend}. Returned sets are copies.
 */
export class AnnotationStore {
  private readonly cache = new Map<string, AnnotationSet>();

  constructor(private readonly backend: AnnotationBackend) {}

  static fromConfig(config: Pick<EngineConfig, 'annotationDir'>): AnnotationStore {
    return new AnnotationStore(new FileBackend(config.annotationDir));
  }

  /** Cached set, else the persisted one, else an empty set */
  get(key: string): AnnotationSet {
    let annotations = this.cache.get(key);
    if (!annotations) {
      annotations = this.backend.read(key) ?? [];
      this.cache.set(key, annotations);
    }
    return copySet(annotations);
  }

  /**
   * Replace the set for `key` and persist it. Saving an empty set does nothing;
   * use {@link clear} to empty a persisted set.
   */
  save(key: string, annotations: AnnotationSet): void {
    if (annotations.length === 0) {
      log.debug(`save("${key}") with an empty set ignored`);
      return;
    }
    this.backend.write(key, annotations);
    this.cache.set(key, copySet(annotations));
    log.debug(`Saved ${annotations.length} annotation(s) for "${key}"`);
  }

  /** Empty the set for `key` and delete its persisted file */
  clear(key: string): void {
    if (this.backend.exists(key)) {
      this.backend.remove(key);
    }
    this.cache.set(key, []);
    log.debug(`Cleared annotations for "${key}"`);
  }

  /** Whether a persisted set exists for `key`, regardless of the cache */
  hasAnnotations(key: string): boolean {
    return this.backend.exists(key);
  }

  /** Drop the cached set so the next `get` reads the backend again */
  evict(key: string): void {
    this.cache.delete(key);
  }

  cachedKeys(): string[] {
    return [...this.cache.keys()];
  }

  /** One `"<class> <cx> <cy> <w> <h>"` line per annotation */
  exportLines(key: string, imageWidth: number, imageHeight: number): string[] {
    assertImageDimensions(imageWidth, imageHeight);
    return this.get(key).map((a) => formatNormalizedLine(toNormalized(a, imageWidth, imageHeight)));
  }

  /**
   * Replace the set for `key` with the annotations parsed from normalized label
   * lines. Blank lines are ignored; malformed lines are counted and skipped.
   */
  importLines(
    key: string,
    lines: readonly string[],
    imageWidth: number,
    imageHeight: number
  ): ImportResult {
    assertImageDimensions(imageWidth, imageHeight);

    const annotations: AnnotationSet = [];
    let skipped = 0;
    for (const raw of lines) {
      const line = raw.trim();
      if (!line) continue;
      try {
        annotations.push(fromNormalized(parseNormalizedLine(line), imageWidth, imageHeight));
      } catch (err) {
        if (!(err instanceof MalformedRecordError)) throw err;
        skipped += 1;
        log.warn(`Skipping label line "${line}" for "${key}": ${err.message}`);
      }
    }

    this.save(key, annotations);
    return { imported: annotations.length, skipped };
  }

  /** Counts over the persisted sets of `keys` */
  getStatistics(keys: readonly string[]): AnnotationStatistics {
    const stats: AnnotationStatistics = {
      totalImages: keys.length,
      annotatedImages: 0,
      unannotatedImages: 0,
      totalAnnotations: 0,
      classCounts: {},
    };

    for (const key of keys) {
      if (!this.hasAnnotations(key)) {
        stats.unannotatedImages += 1;
        continue;
      }
      stats.annotatedImages += 1;
      for (const annotation of this.get(key)) {
        stats.totalAnnotations += 1;
        stats.classCounts[annotation.class_id] = (stats.classCounts[annotation.class_id] ?? 0) + 1;
      }
    }

    return stats;
  }
}
