export type AnnotationErrorKind = 'InvalidImageDimensions' | 'MalformedRecord' | 'PersistenceError';

/** Base class of every error the engine raises */
export abstract class AnnotationError extends Error {
  abstract readonly kind: AnnotationErrorKind;
}

/** A transform was given a zero (or non-integer) image width or height */
export class InvalidImageDimensionsError extends AnnotationError {
  readonly kind = 'InvalidImageDimensions';

  constructor(
    readonly width: number,
    readonly height: number
  ) {
    super(`Invalid image dimensions ${width}x${height}: both must be positive integers`);
    this.name = 'InvalidImageDimensionsError';
  }
}

/** A normalized record or label line does not hold exactly 5 numeric fields */
export class MalformedRecordError extends AnnotationError {
  readonly kind = 'MalformedRecord';

  constructor(
    message: string,
    readonly input?: string
  ) {
    super(message);
    this.name = 'MalformedRecordError';
  }
}

/** Reading, writing or removing the persisted annotations of an image failed */
export class PersistenceError extends AnnotationError {
  readonly kind = 'PersistenceError';

  constructor(
    readonly operation: 'read' | 'write' | 'remove',
    readonly imageKey: string,
    options?: { cause?: unknown }
  ) {
    const detail = options?.cause instanceof Error ? `: ${options.cause.message}` : '';
    super(`Failed to ${operation} annotations for "${imageKey}"${detail}`, options);
    this.name = 'PersistenceError';
  }
}

export function isAnnotationError(value: unknown): value is AnnotationError {
  return value instanceof AnnotationError;
}

/** Message for surfacing any caught value to the user */
export function errorMessage(err: unknown, fallback: string): string {
  return err instanceof Error ? err.message : fallback;
}
