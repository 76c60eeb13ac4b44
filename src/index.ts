import { ClassRegistry } from '@/lib/classes';
import { resolveConfig, type EngineConfig } from '@/lib/config';
import { AnnotationEditor } from '@/lib/editor';
import { HistoryEngine } from '@/lib/history';
import { AnnotationStore } from '@/lib/store';
import type { AnnotationBackend } from '@/lib/storage';

export * from '@/types';
export * from '@/lib/classes';
export * from '@/lib/config';
export * from '@/lib/constants';
export * from '@/lib/editor';
export * from '@/lib/errors';
export * from '@/lib/geometry';
export * from '@/lib/history';
export * from '@/lib/logger';
export * from '@/lib/store';
export * from '@/lib/storage';
export { useAnnotationEditor } from '@/hooks/useAnnotationEditor';
export { AnnotationList } from '@/components/ui/AnnotationList';

export interface Engine {
  config: EngineConfig;
  store: AnnotationStore;
  history: HistoryEngine;
  editor: AnnotationEditor;
  classes: ClassRegistry;
}

/**
 * Wire a store, history and editor together. Persists to
 * `config.annotationDir` unless another backend is given.
 */
export function createEngine(
  overrides: Partial<EngineConfig> = {},
  backend?: AnnotationBackend
): Engine {
  const config = resolveConfig(overrides);
  const store = backend ? new AnnotationStore(backend) : AnnotationStore.fromConfig(config);
  const history = new HistoryEngine(store);
  const editor = new AnnotationEditor(store, history, {
    minSize: config.minSize,
    handleRadius: config.handleRadius,
    edgeMargin: config.edgeMargin,
  });
  return { config, store, history, editor, classes: new ClassRegistry() };
}
