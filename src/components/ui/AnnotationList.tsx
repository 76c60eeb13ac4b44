import type { Annotation, AnnotationSet } from '@/types';
import type { ClassRegistry } from '@/lib/classes';

interface AnnotationListProps {
  annotations: AnnotationSet;
  classes: ClassRegistry;
  selectedIndex: number | null;
  onSelectAnnotation: (index: number) => void;
  onDeleteAnnotation: (index: number) => void;
}

interface AnnotationRowProps {
  annotation: Annotation;
  index: number;
  name: string;
  color: string;
  selected: boolean;
  onSelect: () => void;
  onDelete: () => void;
}

function AnnotationRow({
  annotation,
  index,
  name,
  color,
  selected,
  onSelect,
  onDelete,
}: AnnotationRowProps): JSX.Element {
  return (
    <li
      role="option"
      aria-selected={selected}
      onClick={onSelect}
      className={`group flex cursor-pointer items-center gap-2 rounded p-2 ${
        selected ? 'bg-blue-50 ring-2 ring-blue-500' : 'hover:bg-gray-50'
      }`}
    >
      <span className="h-4 w-4 flex-shrink-0 rounded" style={{ backgroundColor: color }} />
      <span className="min-w-0 flex-1">
        <span className="block text-sm font-medium text-gray-900">
          {index + 1}. {name}
        </span>
        <span className="block text-xs text-gray-500">
          Class ID: {annotation.class_id} · {Math.round(annotation.width)}×
          {Math.round(annotation.height)}
        </span>
      </span>
      <button
        type="button"
        title="Delete annotation"
        className="invisible rounded p-1 text-gray-400 hover:text-red-500 group-hover:visible"
        onClick={(e) => {
          e.stopPropagation();
          onDelete();
        }}
      >
        ×
      </button>
    </li>
  );
}

/**
 * Boxes of the current image in drawing order. Styled with stock Tailwind
 * utility classes supplied by the host page.
 */
export function AnnotationList({
  annotations,
  classes,
  selectedIndex,
  onSelectAnnotation,
  onDeleteAnnotation,
}: AnnotationListProps): JSX.Element {
  if (annotations.length === 0) {
    return (
      <p className="p-4 text-center text-sm text-gray-500">
        No annotations yet. Draw bounding boxes on the image.
      </p>
    );
  }

  return (
    <ul role="listbox" className="flex flex-col gap-1 p-2">
      {annotations.map((annotation, index) => (
        <AnnotationRow
          key={index}
          annotation={annotation}
          index={index}
          name={classes.getName(annotation.class_id)}
          color={classes.getColor(annotation.class_id)}
          selected={selectedIndex === index}
          onSelect={() => onSelectAnnotation(index)}
          onDelete={() => onDeleteAnnotation(index)}
        />
      ))}
    </ul>
  );
}
