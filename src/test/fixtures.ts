import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import type { Annotation, AnnotationSet } from '@/types';

export const boxA: Annotation = { x: 10, y: 10, width: 50, height: 50, class_id: 0 };
export const boxB: Annotation = { x: 100, y: 100, width: 40, height: 30, class_id: 1 };
export const boxC: Annotation = { x: 200, y: 20, width: 60, height: 80, class_id: 2 };

export function sampleSet(): AnnotationSet {
  return [{ ...boxA }, { ...boxB }];
}

/** Fresh temporary directory; remove it with the returned cleanup */
export function makeTempDir(): { dir: string; cleanup: () => void } {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'annotate-test-'));
  return { dir, cleanup: () => fs.rmSync(dir, { recursive: true, force: true }) };
}
