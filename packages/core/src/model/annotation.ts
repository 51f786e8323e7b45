/**
 * Annotations
 * Key/value metadata extracted from `[&...]` comments
 */

export type AnnotationValue =
  | string
  | number
  | boolean
  | readonly (string | number)[];

export interface Annotation {
  readonly name: string;
  readonly value: AnnotationValue;
}

/** Anything that carries annotations and free-text comments */
export interface Annotated {
  readonly annotations: Annotation[];
  readonly comments: string[];
}

/** Find the first annotation with the given name */
export function findAnnotation(
  item: Annotated,
  name: string
): Annotation | undefined {
  return item.annotations.find((a) => a.name === name);
}
