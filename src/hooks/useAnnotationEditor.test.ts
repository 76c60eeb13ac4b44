import { renderHook, act } from '@testing-library/react';
import { beforeEach, describe, it, expect, vi } from 'vitest';
import { useAnnotationEditor } from '@/hooks/useAnnotationEditor';
import { AnnotationEditor } from '@/lib/editor';
import { PersistenceError } from '@/lib/errors';
import { HistoryEngine } from '@/lib/history';
import { AnnotationStore } from '@/lib/store';
import { MemoryBackend } from '@/lib/storage';
import { boxA, boxC } from '@/test/fixtures';

describe('useAnnotationEditor', () => {
  let backend: MemoryBackend;
  let store: AnnotationStore;
  let editor: AnnotationEditor;

  beforeEach(() => {
    backend = new MemoryBackend();
    store = new AnnotationStore(backend);
    editor = new AnnotationEditor(store, new HistoryEngine(store));
  });

  describe('initial state', () => {
    it('should start without an image', () => {
      const { result } = renderHook(() => useAnnotationEditor(editor));

      expect(result.current.imageKey).toBeNull();
      expect(result.current.annotations).toEqual([]);
      expect(result.current.selectedIndex).toBeNull();
      expect(result.current.mode).toBe('idle');
      expect(result.current.canUndo).toBe(false);
      expect(result.current.handle).toEqual({ kind: 'none' });
      expect(result.current.error).toBeNull();
    });
  });

  describe('loadImage', () => {
    it('should expose the persisted annotations of the image', () => {
      store.save('img1', [boxA, boxC]);
      const { result } = renderHook(() => useAnnotationEditor(editor));

      act(() => {
        result.current.loadImage('img1');
      });

      expect(result.current.imageKey).toBe('img1');
      expect(result.current.annotations).toEqual([boxA, boxC]);
    });
  });

  describe('drawing', () => {
    it('should show the preview and the committed box', () => {
      const { result } = renderHook(() => useAnnotationEditor(editor));
      act(() => {
        result.current.loadImage('img1');
      });

      act(() => {
        result.current.pointerDown({ x: 10, y: 10 });
      });
      expect(result.current.mode).toBe('drawing');

      act(() => {
        result.current.pointerMove({ x: 40, y: 40 });
      });
      expect(result.current.liveGeometry).toEqual({ x: 10, y: 10, width: 30, height: 30 });

      act(() => {
        result.current.pointerUp({ x: 60, y: 60 });
      });
      expect(result.current.mode).toBe('idle');
      expect(result.current.liveGeometry).toBeNull();
      expect(result.current.annotations).toEqual([
        { x: 10, y: 10, width: 50, height: 50, class_id: 0 },
      ]);
      expect(result.current.selectedIndex).toBe(0);
      expect(result.current.canUndo).toBe(true);
    });

    it('should undo and redo', () => {
      const { result } = renderHook(() => useAnnotationEditor(editor));
      act(() => {
        result.current.loadImage('img1');
      });
      act(() => {
        result.current.pointerDown({ x: 10, y: 10 });
      });
      act(() => {
        result.current.pointerUp({ x: 60, y: 60 });
      });

      act(() => {
        result.current.undo();
      });
      expect(result.current.annotations).toEqual([]);
      expect(result.current.canRedo).toBe(true);

      act(() => {
        result.current.redo();
      });
      expect(result.current.annotations).toHaveLength(1);
      expect(result.current.canRedo).toBe(false);
    });

    it('should report a failed save and drop the gesture', () => {
      vi.spyOn(backend, 'write').mockImplementation(() => {
        throw new PersistenceError('write', 'img1');
      });
      const { result } = renderHook(() => useAnnotationEditor(editor));
      act(() => {
        result.current.loadImage('img1');
      });
      act(() => {
        result.current.pointerDown({ x: 10, y: 10 });
      });

      act(() => {
        result.current.pointerUp({ x: 60, y: 60 });
      });

      expect(result.current.error).toBe('Failed to write annotations for "img1"');
      expect(result.current.mode).toBe('idle');
      expect(result.current.annotations).toEqual([]);
      expect(result.current.canUndo).toBe(false);
    });
  });

  describe('selection', () => {
    beforeEach(() => {
      store.save('img1', [boxA, boxC]);
    });

    it('should report the handle under the pointer for the selected box', () => {
      const { result } = renderHook(() => useAnnotationEditor(editor));
      act(() => {
        result.current.loadImage('img1');
      });
      act(() => {
        result.current.select(0);
      });

      act(() => {
        result.current.hover({ x: 60, y: 60 });
      });

      expect(result.current.selectedIndex).toBe(0);
      expect(result.current.handle).toEqual({ kind: 'corner', corner: 'bottom-right' });
    });

    it('should delete the selected box', () => {
      const { result } = renderHook(() => useAnnotationEditor(editor));
      act(() => {
        result.current.loadImage('img1');
      });
      act(() => {
        result.current.select(1);
      });

      act(() => {
        result.current.deleteSelected();
      });

      expect(result.current.annotations).toEqual([boxA]);
      expect(result.current.selectedIndex).toBeNull();
    });

    it('should change the class of the selected box', () => {
      const { result } = renderHook(() => useAnnotationEditor(editor));
      act(() => {
        result.current.loadImage('img1');
      });
      act(() => {
        result.current.select(0);
      });

      act(() => {
        result.current.changeSelectedClass(4);
      });

      expect(result.current.annotations[0]?.class_id).toBe(4);
    });

    it('should surface an invalid class change as an error', () => {
      const { result } = renderHook(() => useAnnotationEditor(editor));
      act(() => {
        result.current.loadImage('img1');
      });
      act(() => {
        result.current.select(0);
      });

      act(() => {
        result.current.changeSelectedClass(-3);
      });

      expect(result.current.error).toBe('Class id must be a non-negative integer, got -3');
      expect(result.current.annotations).toEqual([boxA, boxC]);
      expect(result.current.canUndo).toBe(false);
    });

    it('should delete a box by its list index', () => {
      const { result } = renderHook(() => useAnnotationEditor(editor));
      act(() => {
        result.current.loadImage('img1');
      });

      act(() => {
        result.current.deleteAt(0);
      });

      expect(result.current.annotations).toEqual([boxC]);
      expect(result.current.canUndo).toBe(true);
    });

    it('should clear every box', () => {
      const { result } = renderHook(() => useAnnotationEditor(editor));
      act(() => {
        result.current.loadImage('img1');
      });

      act(() => {
        result.current.clearAll();
      });

      expect(result.current.annotations).toEqual([]);
      expect(store.hasAnnotations('img1')).toBe(false);
    });
  });

  describe('setClassId', () => {
    it('should apply a valid class id', () => {
      const { result } = renderHook(() => useAnnotationEditor(editor));

      act(() => {
        result.current.setClassId(2);
      });

      expect(result.current.classId).toBe(2);
      expect(result.current.error).toBeNull();
    });

    it('should surface an invalid class id as an error', () => {
      const { result } = renderHook(() => useAnnotationEditor(editor));

      act(() => {
        result.current.setClassId(-1);
      });

      expect(result.current.error).toBe('Class id must be a non-negative integer, got -1');
      expect(result.current.classId).toBe(0);
    });
  });
});
