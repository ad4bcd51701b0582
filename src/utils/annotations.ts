/**
 * Annotation lookups
 *
 * Annotations arrive from JSDoc block tags. A bare argument is stored under
 * `value`: `@wither withName` reads as `{ value: 'withName' }`.
 */

import type { Annotation } from '../types/declarations.js';

export const POSITIONAL = 'value';

export function findAnnotation(annotations: readonly Annotation[], name: string): Annotation | undefined {
  return annotations.find((annotation) => annotation.name === name);
}

export function hasAnnotation(annotations: readonly Annotation[], name: string): boolean {
  return findAnnotation(annotations, name) !== undefined;
}

/**
 * String value of `key`; lists are joined with commas
 */
export function annotationString(annotation: Annotation | undefined, key: string): string | undefined {
  const value = annotation?.values[key];
  if (value === undefined) return undefined;
  return typeof value === 'string' ? value : value.join(',');
}

/**
 * List value of `key`; a string is split on commas
 */
export function annotationList(annotation: Annotation | undefined, key: string): readonly string[] | undefined {
  const value = annotation?.values[key];
  if (value === undefined) return undefined;
  const items = typeof value === 'string' ? value.split(',') : value;
  return items.map((item) => item.trim()).filter((item) => item.length > 0);
}

/**
 * Value of `key`, falling back to the positional argument
 */
export function namedOrPositional(annotation: Annotation, key: string): string {
  return annotationString(annotation, key) ?? annotationString(annotation, POSITIONAL) ?? '';
}
