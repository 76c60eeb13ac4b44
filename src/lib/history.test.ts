import { beforeEach, describe, it, expect, vi } from 'vitest';
import { AnnotationStore } from '@/lib/store';
import { MemoryBackend } from '@/lib/storage';
import { HistoryEngine, addCommand, deleteCommand, replaceCommand } from '@/lib/history';
import { PersistenceError } from '@/lib/errors';
import { boxA, boxB, boxC } from '@/test/fixtures';

describe('HistoryEngine', () => {
  let backend: MemoryBackend;
  let store: AnnotationStore;
  let history: HistoryEngine;

  beforeEach(() => {
    backend = new MemoryBackend();
    store = new AnnotationStore(backend);
    history = new HistoryEngine(store);
  });

  describe('initial state', () => {
    it('should have nothing to undo or redo', () => {
      expect(history.canUndo()).toBe(false);
      expect(history.canRedo()).toBe(false);
      expect(history.undo()).toBe(false);
      expect(history.redo()).toBe(false);
    });
  });

  describe('add', () => {
    it('should append and capture snapshots at execute time', () => {
      store.save('img1', [boxA]);
      const spec = addCommand('img1', boxB);
      store.save('img1', [boxC]);

      const command = history.execute(spec);

      expect(command.before).toEqual([boxC]);
      expect(command.after).toEqual([boxC, boxB]);
      expect(command.applied).toBe(true);
      expect(store.get('img1')).toEqual([boxC, boxB]);
    });

    it('should draw then undo back to an empty, unpersisted set', () => {
      history.execute(addCommand('img1', { x: 10, y: 10, width: 50, height: 50, class_id: 0 }));
      expect(store.get('img1')).toEqual([{ x: 10, y: 10, width: 50, height: 50, class_id: 0 }]);

      expect(history.undo()).toBe(true);
      expect(store.get('img1')).toEqual([]);
      expect(store.hasAnnotations('img1')).toBe(false);
    });
  });

  describe('delete', () => {
    it('should remove the element at the index', () => {
      store.save('img1', [boxA, boxB, boxC]);
      const command = history.execute(deleteCommand('img1', 1));

      expect(command.after).toEqual([boxA, boxC]);
      expect(store.get('img1')).toEqual([boxA, boxC]);
    });

    it('should empty the persisted set when the last box is deleted', () => {
      store.save('img1', [boxA]);
      history.execute(deleteCommand('img1', 0));

      expect(store.get('img1')).toEqual([]);
      expect(store.hasAnnotations('img1')).toBe(false);

      history.undo();
      expect(store.get('img1')).toEqual([boxA]);
      expect(store.hasAnnotations('img1')).toBe(true);
    });

    it('should degrade to a recorded no-op for a stale index', () => {
      store.save('img1', [boxA]);
      const write = vi.spyOn(backend, 'write');

      const command = history.execute(deleteCommand('img1', 5));

      expect(command.applied).toBe(false);
      expect(command.reason).toBe('IndexOutOfRange');
      expect(command.before).toEqual(command.after);
      expect(write).not.toHaveBeenCalled();
      expect(history.canUndo()).toBe(true);

      expect(history.undo()).toBe(true);
      expect(history.redo()).toBe(true);
      expect(store.get('img1')).toEqual([boxA]);
    });

    it('should treat a negative index as out of range', () => {
      store.save('img1', [boxA]);
      expect(history.execute(deleteCommand('img1', -1)).applied).toBe(false);
      expect(store.get('img1')).toEqual([boxA]);
    });
  });

  describe('replace', () => {
    it('should swap the whole set', () => {
      store.save('img1', [boxA, boxB]);
      history.execute(replaceCommand('img1', [boxC]));
      expect(store.get('img1')).toEqual([boxC]);

      history.undo();
      expect(store.get('img1')).toEqual([boxA, boxB]);
    });

    it('should not be affected by later changes to the given list', () => {
      const list = [{ ...boxA }];
      const spec = replaceCommand('img1', list);
      list.push({ ...boxB });

      history.execute(spec);
      expect(store.get('img1')).toEqual([boxA]);
    });
  });

  describe('undo and redo', () => {
    it('should invert a sequence of commands across images', () => {
      store.save('img2', [boxC]);
      const initial = { img1: store.get('img1'), img2: store.get('img2') };

      history.execute(addCommand('img1', boxA));
      history.execute(addCommand('img2', boxB));
      history.execute(addCommand('img1', boxB));
      history.execute(deleteCommand('img2', 0));
      history.execute(replaceCommand('img1', [boxC]));
      const final = { img1: store.get('img1'), img2: store.get('img2') };

      for (let i = 0; i < 5; i += 1) expect(history.undo()).toBe(true);
      expect({ img1: store.get('img1'), img2: store.get('img2') }).toEqual(initial);
      expect(history.undo()).toBe(false);

      for (let i = 0; i < 5; i += 1) expect(history.redo()).toBe(true);
      expect({ img1: store.get('img1'), img2: store.get('img2') }).toEqual(final);
      expect(history.redo()).toBe(false);
    });

    it('should clear the redo stack on a new command', () => {
      history.execute(addCommand('img1', boxA));
      history.undo();
      expect(history.canRedo()).toBe(true);

      history.execute(addCommand('img1', boxB));

      expect(history.canRedo()).toBe(false);
      expect(history.redo()).toBe(false);
      expect(store.get('img1')).toEqual([boxB]);
    });

    it('should track stack depths', () => {
      history.execute(addCommand('img1', boxA));
      history.execute(addCommand('img1', boxB));
      history.undo();

      expect(history.undoDepth).toBe(1);
      expect(history.redoDepth).toBe(1);
      expect(history.peekUndo()?.after).toEqual([boxA]);
    });

    it('should drop everything on clear', () => {
      history.execute(addCommand('img1', boxA));
      history.execute(addCommand('img1', boxB));
      history.undo();

      history.clear();

      expect(history.canUndo()).toBe(false);
      expect(history.canRedo()).toBe(false);
      expect(store.get('img1')).toEqual([boxA]);
    });
  });

  describe('persistence failures', () => {
    it('should propagate and drop the popped command on a failed undo', () => {
      history.execute(addCommand('img1', boxA));
      history.execute(addCommand('img1', boxB));
      vi.spyOn(backend, 'write').mockImplementation(() => {
        throw new PersistenceError('write', 'img1');
      });

      expect(() => history.undo()).toThrow(PersistenceError);

      expect(history.undoDepth).toBe(1);
      expect(history.redoDepth).toBe(0);
      expect(store.get('img1')).toEqual([boxA, boxB]);
    });

    it('should keep memory and storage in step when an undo cannot remove the file', () => {
      history.execute(addCommand('img1', boxA));
      vi.spyOn(backend, 'remove').mockImplementation(() => {
        throw new PersistenceError('remove', 'img1');
      });

      expect(() => history.undo()).toThrow(PersistenceError);

      expect(store.get('img1')).toEqual([boxA]);
      expect(store.get('img1')).toEqual(backend.read('img1'));
      expect(history.canUndo()).toBe(false);
      expect(history.canRedo()).toBe(false);
    });

    it('should not record a command whose execution failed', () => {
      vi.spyOn(backend, 'write').mockImplementation(() => {
        throw new PersistenceError('write', 'img1');
      });

      expect(() => history.execute(addCommand('img1', boxA))).toThrow(PersistenceError);
      expect(history.canUndo()).toBe(false);
    });
  });
});
