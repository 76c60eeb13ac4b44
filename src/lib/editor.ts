import type {
  Annotation,
  AnnotationSet,
  Corner,
  EditMode,
  EditorPointerEvent,
  HandleHit,
  Point,
  Rect,
  ResizeHandle,
} from '@/types';
import type { EngineConfig } from '@/lib/config';
import { EDGE_MARGIN, HANDLE_RADIUS, MIN_SIZE } from '@/lib/constants';
import {
  annotationRect,
  isCommittableSize,
  rectFromPoints,
  rectsEqual,
  translateRect,
} from '@/lib/geometry';
import {
  addCommand,
  deleteCommand,
  replaceCommand,
  type Command,
  type HistoryEngine,
} from '@/lib/history';
import type { AnnotationStore } from '@/lib/store';

export type EditorOptions = Pick<EngineConfig, 'minSize' | 'handleRadius' | 'edgeMargin'>;

export const DEFAULT_EDITOR_OPTIONS: Readonly<EditorOptions> = {
  minSize: MIN_SIZE,
  handleRadius: HANDLE_RADIUS,
  edgeMargin: EDGE_MARGIN,
};

export type EditState =
  | { mode: 'idle' }
  | { mode: 'drawing'; anchor: Point; preview: Rect }
  | { mode: 'dragging'; index: number; anchor: Point; original: Rect; live: Rect }
  | {
      mode: 'resizing';
      index: number;
      handle: ResizeHandle;
      anchor: Point;
      original: Rect;
      live: Rect;
    };

export interface EditorSnapshot {
  state: EditState;
  selectedIndex: number | null;
}

/** Geometry change to be turned into a command by the caller */
export type PendingCommit = { kind: 'add'; rect: Rect } | { kind: 'update'; index: number; rect: Rect };

export interface Transition {
  next: EditorSnapshot;
  commit: PendingCommit | null;
  /** Handle classification, reported for hover events only */
  handle: HandleHit | null;
}

export const IDLE: EditorSnapshot = { state: { mode: 'idle' }, selectedIndex: null };

const NO_HANDLE: HandleHit = { kind: 'none' };

function corners(rect: Rect): [Corner, Point][] {
  const right = rect.x + rect.width;
  const bottom = rect.y + rect.height;
  return [
    ['top-left', { x: rect.x, y: rect.y }],
    ['top-right', { x: right, y: rect.y }],
    ['bottom-left', { x: rect.x, y: bottom }],
    ['bottom-right', { x: right, y: bottom }],
  ];
}

/**
 * Classify where `point` sits relative to `rect`: on a corner handle, on the
 * edge band, or neither.
 */
export function classifyHandle(
  rect: Rect,
  point: Point,
  options: EditorOptions = DEFAULT_EDITOR_OPTIONS
): HandleHit {
  for (const [corner, at] of corners(rect)) {
    if (Math.hypot(point.x - at.x, point.y - at.y) <= options.handleRadius) {
      return { kind: 'corner', corner };
    }
  }

  const margin = options.edgeMargin;
  const left = rect.x;
  const top = rect.y;
  const right = rect.x + rect.width;
  const bottom = rect.y + rect.height;
  const withinBand =
    point.x >= left - margin &&
    point.x <= right + margin &&
    point.y >= top - margin &&
    point.y <= bottom + margin;
  if (!withinBand) return NO_HANDLE;

  const nearEdge =
    Math.abs(point.x - left) <= margin ||
    Math.abs(point.x - right) <= margin ||
    Math.abs(point.y - top) <= margin ||
    Math.abs(point.y - bottom) <= margin;
  return nearEdge ? { kind: 'edge' } : NO_HANDLE;
}

function containsPoint(rect: Rect, point: Point): boolean {
  return (
    point.x >= rect.x &&
    point.x <= rect.x + rect.width &&
    point.y >= rect.y &&
    point.y <= rect.y + rect.height
  );
}

function isOverBox(rect: Rect, point: Point, options: EditorOptions): boolean {
  return containsPoint(rect, point) || classifyHandle(rect, point, options).kind !== 'none';
}

/**
 * Index of the box under `point`. The selected box wins so its handles stay
 * reachable; otherwise the topmost (last drawn) box.
 */
export function hitTest(
  annotations: readonly Annotation[],
  point: Point,
  selectedIndex: number | null,
  options: EditorOptions = DEFAULT_EDITOR_OPTIONS
): number | null {
  if (selectedIndex !== null) {
    const selected = annotations[selectedIndex];
    if (selected && isOverBox(annotationRect(selected), point, options)) return selectedIndex;
  }
  for (let i = annotations.length - 1; i >= 0; i -= 1) {
    const annotation = annotations[i];
    if (annotation && isOverBox(annotationRect(annotation), point, options)) return i;
  }
  return null;
}

/** Rectangle after moving `handle` of `original` by (dx, dy); may be degenerate */
export function resizeRect(original: Rect, handle: ResizeHandle, dx: number, dy: number): Rect {
  let left = original.x;
  let top = original.y;
  let right = original.x + original.width;
  let bottom = original.y + original.height;

  switch (handle) {
    case 'top-left':
      left += dx;
      top += dy;
      break;
    case 'top-right':
      right += dx;
      top += dy;
      break;
    case 'bottom-left':
      left += dx;
      bottom += dy;
      break;
    case 'bottom-right':
      right += dx;
      bottom += dy;
      break;
    case 'edge':
      left -= dx / 2;
      right += dx / 2;
      top -= dy / 2;
      bottom += dy / 2;
      break;
  }

  return { x: left, y: top, width: right - left, height: bottom - top };
}

function startGesture(
  snapshot: EditorSnapshot,
  annotations: readonly Annotation[],
  point: Point,
  options: EditorOptions
): EditorSnapshot {
  const index = hitTest(annotations, point, snapshot.selectedIndex, options);
  const target = index === null ? undefined : annotations[index];
  if (index === null || !target) {
    return {
      state: { mode: 'drawing', anchor: point, preview: rectFromPoints(point, point) },
      selectedIndex: null,
    };
  }

  const original = annotationRect(target);
  const hit = classifyHandle(original, point, options);
  if (hit.kind === 'none') {
    return {
      state: { mode: 'dragging', index, anchor: point, original, live: original },
      selectedIndex: index,
    };
  }
  return {
    state: {
      mode: 'resizing',
      index,
      handle: hit.kind === 'corner' ? hit.corner : 'edge',
      anchor: point,
      original,
      live: original,
    },
    selectedIndex: index,
  };
}

/**
 * Pure transition of the edit state machine. Events that have no meaning in
 * the current state leave the snapshot unchanged.
 */
export function transition(
  snapshot: EditorSnapshot,
  event: EditorPointerEvent,
  annotations: readonly Annotation[],
  options: EditorOptions = DEFAULT_EDITOR_OPTIONS
): Transition {
  const { state, selectedIndex } = snapshot;
  const unchanged: Transition = { next: snapshot, commit: null, handle: null };
  const { point } = event;

  switch (state.mode) {
    case 'idle': {
      if (event.type === 'pointerdown') {
        return { next: startGesture(snapshot, annotations, point, options), commit: null, handle: null };
      }
      if (event.type === 'hover') {
        const selected = selectedIndex === null ? undefined : annotations[selectedIndex];
        const handle = selected ? classifyHandle(annotationRect(selected), point, options) : NO_HANDLE;
        return { ...unchanged, handle };
      }
      return unchanged;
    }

    case 'drawing': {
      const preview = rectFromPoints(state.anchor, point);
      if (event.type === 'pointermove') {
        return { ...unchanged, next: { state: { ...state, preview }, selectedIndex } };
      }
      if (event.type === 'pointerup') {
        const commit: PendingCommit | null = isCommittableSize(preview, options.minSize)
          ? { kind: 'add', rect: preview }
          : null;
        return { next: { state: { mode: 'idle' }, selectedIndex }, commit, handle: null };
      }
      return unchanged;
    }

    case 'dragging':
    case 'resizing': {
      if (event.type !== 'pointermove' && event.type !== 'pointerup') return unchanged;

      const dx = point.x - state.anchor.x;
      const dy = point.y - state.anchor.y;
      let live = state.live;
      if (state.mode === 'dragging') {
        live = translateRect(state.original, dx, dy);
      } else {
        const candidate = resizeRect(state.original, state.handle, dx, dy);
        if (isCommittableSize(candidate, options.minSize)) live = candidate;
      }

      if (event.type === 'pointermove') {
        return { ...unchanged, next: { state: { ...state, live }, selectedIndex } };
      }
      const commit: PendingCommit | null = rectsEqual(live, state.original)
        ? null
        : { kind: 'update', index: state.index, rect: live };
      return { next: { state: { mode: 'idle' }, selectedIndex }, commit, handle: null };
    }
  }
}

function assertClassId(classId: number): void {
  if (!Number.isInteger(classId) || classId < 0) {
    throw new RangeError(`Class id must be a non-negative integer, got ${classId}`);
  }
}

/** Result of dispatching one pointer event */
export interface EditOutcome {
  state: EditMode;
  selectedIndex: number | null;
  /** Live preview/drag geometry, or the committed rectangle */
  geometry: Rect | null;
  committed: boolean;
  command: Command | null;
  /** Committed annotations of the current image */
  annotations: AnnotationSet;
  handle: HandleHit | null;
}

function liveGeometry(state: EditState): Rect | null {
  switch (state.mode) {
    case 'idle':
      return null;
    case 'drawing':
      return state.preview;
    case 'dragging':
    case 'resizing':
      return state.live;
  }
}

/**
 * Stateful editor for one image at a time. Turns pointer events into commands
 * executed through the history engine and owns the single selection.
 */
export class AnnotationEditor {
  private snapshot: EditorSnapshot = IDLE;
  private currentKey: string | null = null;
  private currentClassId = 0;
  private readonly options: EditorOptions;

  constructor(
    private readonly store: AnnotationStore,
    private readonly history: HistoryEngine,
    options: Partial<EditorOptions> = {}
  ) {
    this.options = { ...DEFAULT_EDITOR_OPTIONS, ...options };
  }

  get imageKey(): string | null {
    return this.currentKey;
  }

  get mode(): EditMode {
    return this.snapshot.state.mode;
  }

  /** Selected box, or null once the index no longer points into the current set */
  get selectedIndex(): number | null {
    const index = this.snapshot.selectedIndex;
    return index !== null && index < this.annotations().length ? index : null;
  }

  get classId(): number {
    return this.currentClassId;
  }

  /** Class id given to newly drawn boxes */
  setClassId(classId: number): void {
    assertClassId(classId);
    this.currentClassId = classId;
  }

  /** Switch to another image; drops any gesture and the selection */
  setImage(imageKey: string | null): void {
    this.currentKey = imageKey;
    this.snapshot = IDLE;
  }

  annotations(): AnnotationSet {
    return this.currentKey === null ? [] : this.store.get(this.currentKey);
  }

  /** Live geometry of the gesture in progress, if any */
  liveGeometry(): Rect | null {
    return liveGeometry(this.snapshot.state);
  }

  isSelected(index: number): boolean {
    return this.selectedIndex === index;
  }

  /** Select a box (or nothing). Only possible while idle. */
  select(index: number | null): boolean {
    if (this.snapshot.state.mode !== 'idle') return false;
    if (index !== null && (index < 0 || index >= this.annotations().length)) return false;
    this.snapshot = { ...this.snapshot, selectedIndex: index };
    return true;
  }

  /** Abort the gesture in progress without committing */
  cancel(): void {
    this.snapshot = { ...this.snapshot, state: { mode: 'idle' } };
  }

  dispatchPointerEvent(event: EditorPointerEvent): EditOutcome {
    const key = this.currentKey;
    if (key === null) {
      return this.outcome(null, false, null, null);
    }

    const current = this.store.get(key);
    const { next, commit, handle } = transition(this.snapshot, event, current, this.options);
    this.snapshot = next;

    if (!commit) {
      return this.outcome(liveGeometry(next.state), false, null, handle);
    }

    let command: Command;
    if (commit.kind === 'add') {
      command = this.history.execute(
        addCommand(key, { ...commit.rect, class_id: this.currentClassId })
      );
      this.snapshot = { ...this.snapshot, selectedIndex: command.after.length - 1 };
    } else {
      const updated = current.map((a, i) => (i === commit.index ? { ...a, ...commit.rect } : a));
      command = this.history.execute(replaceCommand(key, updated));
    }
    return this.outcome(commit.rect, true, command, handle);
  }

  /** Delete the selected box; null when nothing is selected */
  deleteSelected(): Command | null {
    const index = this.selectedIndex;
    return index === null ? null : this.deleteAt(index);
  }

  /** Delete the box at `index`; null when there is no such box. Clears the selection. */
  deleteAt(index: number): Command | null {
    const key = this.currentKey;
    if (key === null || !Number.isInteger(index) || index < 0) return null;
    if (index >= this.annotations().length) return null;

    this.snapshot = IDLE;
    return this.history.execute(deleteCommand(key, index));
  }

  /** Reassign the class of the selected box; null when nothing is selected */
  changeSelectedClass(classId: number): Command | null {
    assertClassId(classId);
    const key = this.currentKey;
    const index = this.selectedIndex;
    if (key === null || index === null) return null;

    const current = this.store.get(key);
    if (!current[index]) return null;
    const updated = current.map((a, i) => (i === index ? { ...a, class_id: classId } : a));
    return this.history.execute(replaceCommand(key, updated));
  }

  /** Remove every box of the current image as one undoable step */
  clearAll(): Command | null {
    const key = this.currentKey;
    if (key === null || this.store.get(key).length === 0) return null;

    this.snapshot = IDLE;
    return this.history.execute(replaceCommand(key, []));
  }

  undo(): boolean {
    this.snapshot = IDLE;
    return this.history.undo();
  }

  redo(): boolean {
    this.snapshot = IDLE;
    return this.history.redo();
  }

  canUndo(): boolean {
    return this.history.canUndo();
  }

  canRedo(): boolean {
    return this.history.canRedo();
  }

  private outcome(
    geometry: Rect | null,
    committed: boolean,
    command: Command | null,
    handle: HandleHit | null
  ): EditOutcome {
    return {
      state: this.snapshot.state.mode,
      selectedIndex: this.selectedIndex,
      geometry,
      committed,
      command,
      annotations: this.annotations(),
      handle,
    };
  }
}
