/** A single annotation on an image (pixel coordinates, top-left origin) */
export interface Annotation {
  x: number;
  y: number;
  width: number;
  height: number;
  class_id: number;
}

/** Annotations of one image, in insertion order */
export type AnnotationSet = Annotation[];

/** Normalized detection record: class id, center x, center y, width, height */
export type NormalizedRecord = [number, number, number, number, number];

/** Point in image space */
export interface Point {
  x: number;
  y: number;
}

/** Axis-aligned rectangle in image space */
export interface Rect {
  x: number;
  y: number;
  width: number;
  height: number;
}

/** Class definition in the class registry */
export interface ClassInfo {
  id: number;
  name: string;
  color: string;
}

/** Per-key persisted annotations summary */
export interface AnnotationStatistics {
  totalImages: number;
  annotatedImages: number;
  unannotatedImages: number;
  totalAnnotations: number;
  classCounts: Record<number, number>;
}

/** Outcome of importing normalized label lines */
export interface ImportResult {
  imported: number;
  skipped: number;
}

/** Corners a box can be resized from */
export type Corner = 'top-left' | 'top-right' | 'bottom-left' | 'bottom-right';

/** Active resize handle; 'edge' resizes symmetrically about the center */
export type ResizeHandle = Corner | 'edge';

/** Pointer proximity to the selected box, used for cursor feedback */
export type HandleHit = { kind: 'none' } | { kind: 'corner'; corner: Corner } | { kind: 'edge' };

/** Edit modes of the canvas */
export type EditMode = 'idle' | 'drawing' | 'dragging' | 'resizing';

/** Pointer events consumed by the editor, in image space */
export type PointerEventKind = 'pointerdown' | 'pointermove' | 'pointerup' | 'hover';

export interface EditorPointerEvent {
  type: PointerEventKind;
  point: Point;
}
