import type { Annotation, NormalizedRecord, Point, Rect } from '@/types';
import { NORMALIZED_PRECISION } from '@/lib/constants';
import { InvalidImageDimensionsError, MalformedRecordError } from '@/lib/errors';

/** Throws `InvalidImageDimensionsError` unless both dimensions are positive integers */
export function assertImageDimensions(imageWidth: number, imageHeight: number): void {
  const valid = (n: number): boolean => Number.isInteger(n) && n > 0;
  if (!valid(imageWidth) || !valid(imageHeight)) {
    throw new InvalidImageDimensionsError(imageWidth, imageHeight);
  }
}

/**
 * Convert a pixel-space annotation to the normalized (class, cx, cy, w, h) record.
 * Values are not clamped: a box reaching outside the image yields values outside [0, 1].
 */
export function toNormalized(
  annotation: Annotation,
  imageWidth: number,
  imageHeight: number
): NormalizedRecord {
  assertImageDimensions(imageWidth, imageHeight);
  return [
    annotation.class_id,
    (annotation.x + annotation.width / 2) / imageWidth,
    (annotation.y + annotation.height / 2) / imageHeight,
    annotation.width / imageWidth,
    annotation.height / imageHeight,
  ];
}

/**
 * Convert a normalized record back to pixel space.
 * The class id is truncated toward zero.
 */
export function fromNormalized(
  record: readonly number[],
  imageWidth: number,
  imageHeight: number
): Annotation {
  if (record.length !== 5) {
    throw new MalformedRecordError(`Expected 5 fields, got ${record.length}`);
  }
  if (!record.every((value) => Number.isFinite(value))) {
    throw new MalformedRecordError('Record fields must be finite numbers');
  }
  assertImageDimensions(imageWidth, imageHeight);

  const [classId = 0, xCenter = 0, yCenter = 0, normWidth = 0, normHeight = 0] = record;
  const width = normWidth * imageWidth;
  const height = normHeight * imageHeight;
  return {
    x: xCenter * imageWidth - width / 2,
    y: yCenter * imageHeight - height / 2,
    width,
    height,
    class_id: Math.trunc(classId),
  };
}

/** Format a record as `"<class> <cx> <cy> <w> <h>"` with fixed geometry precision */
export function formatNormalizedLine(record: NormalizedRecord): string {
  const [classId, ...geometry] = record;
  return [String(Math.trunc(classId)), ...geometry.map((v) => v.toFixed(NORMALIZED_PRECISION))].join(
    ' '
  );
}

/** Parse a whitespace-separated label line into a record */
export function parseNormalizedLine(line: string): NormalizedRecord {
  const parts = line.trim().split(/\s+/).filter(Boolean);
  if (parts.length !== 5) {
    throw new MalformedRecordError(`Expected 5 fields, got ${parts.length}`, line);
  }
  const values = parts.map(Number);
  const [classId, xCenter, yCenter, width, height] = values;
  if (
    classId === undefined ||
    xCenter === undefined ||
    yCenter === undefined ||
    width === undefined ||
    height === undefined ||
    !values.every((v) => Number.isFinite(v))
  ) {
    throw new MalformedRecordError(`Non-numeric field in "${line}"`, line);
  }
  return [classId, xCenter, yCenter, width, height];
}

/** Axis-aligned rectangle spanned by two corner points */
export function rectFromPoints(p1: Point, p2: Point): Rect {
  return {
    x: Math.min(p1.x, p2.x),
    y: Math.min(p1.y, p2.y),
    width: Math.abs(p2.x - p1.x),
    height: Math.abs(p2.y - p1.y),
  };
}

export function translateRect(rect: Rect, dx: number, dy: number): Rect {
  return { ...rect, x: rect.x + dx, y: rect.y + dy };
}

/** True when both sides are strictly larger than `minSize` */
export function isCommittableSize(rect: Rect, minSize: number): boolean {
  return rect.width > minSize && rect.height > minSize;
}

export function rectsEqual(a: Rect, b: Rect): boolean {
  return a.x === b.x && a.y === b.y && a.width === b.width && a.height === b.height;
}

export function annotationRect(annotation: Annotation): Rect {
  return { x: annotation.x, y: annotation.y, width: annotation.width, height: annotation.height };
}
