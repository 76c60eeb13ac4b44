import { useState, useCallback } from 'react';
import type { AnnotationSet, EditMode, HandleHit, Point, PointerEventKind, Rect } from '@/types';
import type { AnnotationEditor } from '@/lib/editor';
import { errorMessage } from '@/lib/errors';

interface EditorView {
  imageKey: string | null;
  annotations: AnnotationSet;
  selectedIndex: number | null;
  mode: EditMode;
  liveGeometry: Rect | null;
  classId: number;
  canUndo: boolean;
  canRedo: boolean;
}

interface UseAnnotationEditorResult extends EditorView {
  handle: HandleHit;
  error: string | null;
  loadImage: (imageKey: string | null) => void;
  pointerDown: (point: Point) => void;
  pointerMove: (point: Point) => void;
  pointerUp: (point: Point) => void;
  hover: (point: Point) => void;
  cancelGesture: () => void;
  select: (index: number | null) => void;
  setClassId: (classId: number) => void;
  deleteSelected: () => void;
  deleteAt: (index: number) => void;
  changeSelectedClass: (classId: number) => void;
  clearAll: () => void;
  undo: () => void;
  redo: () => void;
}

function readView(editor: AnnotationEditor): EditorView {
  return {
    imageKey: editor.imageKey,
    annotations: editor.annotations(),
    selectedIndex: editor.selectedIndex,
    mode: editor.mode,
    liveGeometry: editor.liveGeometry(),
    classId: editor.classId,
    canUndo: editor.canUndo(),
    canRedo: editor.canRedo(),
  };
}

const NO_HANDLE: HandleHit = { kind: 'none' };

/**
 * Hook exposing an {@link AnnotationEditor} to React components.
 * `select` and `deleteAt` take list indices, so they plug straight into
 * `AnnotationList`'s `onSelectAnnotation` and `onDeleteAnnotation`.
 */
export function useAnnotationEditor(editor: AnnotationEditor): UseAnnotationEditorResult {
  const [view, setView] = useState<EditorView>(() => readView(editor));
  const [handle, setHandle] = useState<HandleHit>(NO_HANDLE);
  const [error, setError] = useState<string | null>(null);

  const run = useCallback(
    (action: () => void, failure: string) => {
      try {
        action();
        setError(null);
      } catch (err) {
        setError(errorMessage(err, failure));
        // Abandon the gesture so the next pointer event starts fresh.
        editor.cancel();
      }
      try {
        setView(readView(editor));
      } catch (err) {
        setError(errorMessage(err, 'Failed to load annotations'));
      }
    },
    [editor]
  );

  const dispatch = useCallback(
    (type: PointerEventKind, point: Point) => {
      run(() => {
        const outcome = editor.dispatchPointerEvent({ type, point });
        if (type === 'hover') setHandle(outcome.handle ?? NO_HANDLE);
      }, 'Failed to save annotation');
    },
    [editor, run]
  );

  const loadImage = useCallback(
    (imageKey: string | null) => {
      setHandle(NO_HANDLE);
      run(() => editor.setImage(imageKey), 'Failed to load annotations');
    },
    [editor, run]
  );

  const pointerDown = useCallback((point: Point) => dispatch('pointerdown', point), [dispatch]);
  const pointerMove = useCallback((point: Point) => dispatch('pointermove', point), [dispatch]);
  const pointerUp = useCallback((point: Point) => dispatch('pointerup', point), [dispatch]);
  const hover = useCallback((point: Point) => dispatch('hover', point), [dispatch]);

  const cancelGesture = useCallback(() => {
    run(() => editor.cancel(), 'Failed to cancel');
  }, [editor, run]);

  const select = useCallback(
    (index: number | null) => {
      run(() => {
        editor.select(index);
      }, 'Failed to select annotation');
    },
    [editor, run]
  );

  const setClassId = useCallback(
    (classId: number) => {
      run(() => editor.setClassId(classId), 'Invalid class');
    },
    [editor, run]
  );

  const deleteSelected = useCallback(() => {
    run(() => {
      editor.deleteSelected();
    }, 'Failed to delete annotation');
  }, [editor, run]);

  const deleteAt = useCallback(
    (index: number) => {
      run(() => {
        editor.deleteAt(index);
      }, 'Failed to delete annotation');
    },
    [editor, run]
  );

  const changeSelectedClass = useCallback(
    (classId: number) => {
      run(() => {
        editor.changeSelectedClass(classId);
      }, 'Failed to update annotation');
    },
    [editor, run]
  );

  const clearAll = useCallback(() => {
    run(() => {
      editor.clearAll();
    }, 'Failed to clear annotations');
  }, [editor, run]);

  const undo = useCallback(() => {
    run(() => {
      editor.undo();
    }, 'Failed to undo');
  }, [editor, run]);

  const redo = useCallback(() => {
    run(() => {
      editor.redo();
    }, 'Failed to redo');
  }, [editor, run]);

  return {
    ...view,
    handle,
    error,
    loadImage,
    pointerDown,
    pointerMove,
    pointerUp,
    hover,
    cancelGesture,
    select,
    setClassId,
    deleteSelected,
    deleteAt,
    changeSelectedClass,
    clearAll,
    undo,
    redo,
  };
}
