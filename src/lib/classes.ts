import type { ClassInfo } from '@/types';
import { FALLBACK_CLASS_COLOR, getClassColor } from '@/lib/constants';

/**
 * Registry of annotation classes (id → name, color). Annotations never have
 * their class id checked against it; unknown ids get a fallback name and color.
 */
export class ClassRegistry {
  private readonly classes = new Map<number, Omit<ClassInfo, 'id'>>();

  constructor(initial: readonly ClassInfo[] = []) {
    this.loadFromList(initial);
  }

  get size(): number {
    return this.classes.size;
  }

  /** Id that the next `add` of a new name will receive */
  get nextId(): number {
    return this.classes.size === 0 ? 0 : Math.max(...this.classes.keys()) + 1;
  }

  /** Register `name`; an existing name returns its id unchanged */
  add(name: string, color?: string): number {
    const existing = this.findByName(name);
    if (existing !== null) return existing;

    const id = this.nextId;
    this.classes.set(id, { name, color: color ?? getClassColor(id) });
    return id;
  }

  /** Rename or recolor a registered class; false when `id` is unknown */
  update(id: number, name: string, color: string): boolean {
    if (!this.classes.has(id)) return false;
    this.classes.set(id, { name, color });
    return true;
  }

  /** Register or overwrite the class under a caller-chosen id */
  upsert(id: number, name: string, color: string): number {
    if (!Number.isInteger(id) || id < 0) {
      throw new RangeError(`Class id must be a non-negative integer, got ${id}`);
    }
    this.classes.set(id, { name, color });
    return id;
  }

  remove(id: number): boolean {
    return this.classes.delete(id);
  }

  get(id: number): ClassInfo | null {
    const entry = this.classes.get(id);
    return entry ? { id, ...entry } : null;
  }

  getName(id: number): string {
    return this.classes.get(id)?.name ?? `Unknown(${id})`;
  }

  getColor(id: number): string {
    return this.classes.get(id)?.color ?? FALLBACK_CLASS_COLOR;
  }

  findByName(name: string): number | null {
    for (const [id, entry] of this.classes) {
      if (entry.name === name) return id;
    }
    return null;
  }

  /** All classes sorted by id */
  list(): ClassInfo[] {
    return [...this.classes.entries()]
      .sort(([a], [b]) => a - b)
      .map(([id, entry]) => ({ id, ...entry }));
  }

  /** Replace the registry contents */
  loadFromList(list: readonly ClassInfo[]): void {
    this.classes.clear();
    for (const info of list) {
      this.upsert(info.id, info.name, info.color);
    }
  }
}
