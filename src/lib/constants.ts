/**
 * Shared constants for the annotation engine.
 */

/** Boxes must be strictly larger than this in both dimensions (pixels) */
export const MIN_SIZE = 10;

/** Distance from a corner that grabs the corner handle (pixels) */
export const HANDLE_RADIUS = 8;

/** Distance from an edge that grabs the symmetric edge handle (pixels) */
export const EDGE_MARGIN = 5;

/** Decimal places used for the geometry fields of normalized label lines */
export const NORMALIZED_PRECISION = 6;

/** Color palette assigned to classes in registration order */
export const CLASS_COLORS: readonly string[] = [
  '#22c55e',
  '#3b82f6',
  '#f59e0b',
  '#ef4444',
  '#8b5cf6',
  '#ec4899',
  '#14b8a6',
  '#f97316',
];

/** Color used for class ids that are not registered */
export const FALLBACK_CLASS_COLOR = '#808080';

/**
 * Get the palette color for a class id.
 * Ids beyond the palette wrap around.
 *
 * @param classId - The class id
 * @returns The hex color string for the class
 */
export function getClassColor(classId: number): string {
  if (!Number.isInteger(classId) || classId < 0) return FALLBACK_CLASS_COLOR;
  return CLASS_COLORS[classId % CLASS_COLORS.length] ?? FALLBACK_CLASS_COLOR;
}
