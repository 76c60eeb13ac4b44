import type { Annotation, AnnotationSet } from '@/types';
import { log } from '@/lib/logger';
import type { AnnotationStore } from '@/lib/store';

/** What a command should do; snapshots are taken only when it is executed */
export type CommandSpec =
  | { kind: 'add'; imageKey: string; annotation: Annotation }
  | { kind: 'delete'; imageKey: string; index: number }
  | { kind: 'replace'; imageKey: string; annotations: AnnotationSet };

/** An executed command: the set of one image before and after it ran */
export interface Command {
  readonly spec: CommandSpec;
  readonly imageKey: string;
  readonly before: AnnotationSet;
  readonly after: AnnotationSet;
  /** False when the command degenerated to a no-op */
  readonly applied: boolean;
  readonly reason?: 'IndexOutOfRange';
}

export function addCommand(imageKey: string, annotation: Annotation): CommandSpec {
  return { kind: 'add', imageKey, annotation: { ...annotation } };
}

export function deleteCommand(imageKey: string, index: number): CommandSpec {
  return { kind: 'delete', imageKey, index };
}

export function replaceCommand(imageKey: string, annotations: AnnotationSet): CommandSpec {
  return { kind: 'replace', imageKey, annotations: annotations.map((a) => ({ ...a })) };
}

type Plan = Pick<Command, 'after' | 'applied' | 'reason'>;

function plan(spec: CommandSpec, before: AnnotationSet): Plan {
  switch (spec.kind) {
    case 'add':
      return { after: [...before, { ...spec.annotation }], applied: true };
    case 'delete':
      if (!Number.isInteger(spec.index) || spec.index < 0 || spec.index >= before.length) {
        return { after: before, applied: false, reason: 'IndexOutOfRange' };
      }
      return { after: before.filter((_, i) => i !== spec.index), applied: true };
    case 'replace':
      return { after: spec.annotations.map((a) => ({ ...a })), applied: true };
  }
}

/**
 * Undo/redo over whole per-image annotation sets. The stacks are shared by all
 * images: a command for one image can sit below a command for another.
 */
export class HistoryEngine {
  private readonly undoStack: Command[] = [];
  private readonly redoStack: Command[] = [];

  constructor(private readonly store: AnnotationStore) {}

  /**
   * Run `spec` against the store and record it. A delete whose index is out of
   * range is recorded as a no-op with `applied: false`.
   */
  execute(spec: CommandSpec): Command {
    const before = this.store.get(spec.imageKey);
    const { after, applied, reason } = plan(spec, before);
    if (applied) {
      this.apply(spec.imageKey, after);
    } else {
      log.debug(`${spec.kind} on "${spec.imageKey}" was a no-op (${reason ?? 'unchanged'})`);
    }

    const command: Command = { spec, imageKey: spec.imageKey, before, after, applied, reason };
    this.undoStack.push(command);
    this.redoStack.length = 0;
    return command;
  }

  /** Restore the `before` snapshot of the latest command; false when there is none */
  undo(): boolean {
    const command = this.undoStack.pop();
    if (!command) return false;

    this.restore(command, command.before, 'undo');
    this.redoStack.push(command);
    return true;
  }

  /** Re-apply the `after` snapshot of the latest undone command; false when there is none */
  redo(): boolean {
    const command = this.redoStack.pop();
    if (!command) return false;

    this.restore(command, command.after, 'redo');
    this.undoStack.push(command);
    return true;
  }

  canUndo(): boolean {
    return this.undoStack.length > 0;
  }

  canRedo(): boolean {
    return this.redoStack.length > 0;
  }

  get undoDepth(): number {
    return this.undoStack.length;
  }

  get redoDepth(): number {
    return this.redoStack.length;
  }

  /** Latest command that can be undone, if any */
  peekUndo(): Command | undefined {
    return this.undoStack[this.undoStack.length - 1];
  }

  clear(): void {
    this.undoStack.length = 0;
    this.redoStack.length = 0;
  }

  // A failed restore drops the popped command; the error reaches the caller.
  private restore(command: Command, snapshot: AnnotationSet, action: 'undo' | 'redo'): void {
    if (!command.applied) return;
    try {
      this.apply(command.imageKey, snapshot);
    } catch (err) {
      log.warn(`${action} of ${command.spec.kind} on "${command.imageKey}" failed:`, err);
      throw err;
    }
  }

  // Only clear() empties a persisted set, so empty snapshots go through it.
  private apply(imageKey: string, snapshot: AnnotationSet): void {
    if (snapshot.length === 0) {
      this.store.clear(imageKey);
    } else {
      this.store.save(imageKey, snapshot);
    }
  }
}
