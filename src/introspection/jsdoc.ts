/**
 * JSDoc block tags as annotations
 *
 * A tag line such as `@viaConstructor parameterOrder=name,age` yields one
 * annotation. `key=value` arguments become named values; the remaining words
 * form the positional `value`.
 */

import type * as t from '@babel/types';
import type { Annotation } from '../types/index.js';
import { POSITIONAL } from '../utils/annotations.js';

const TAG_LINE = /^@([A-Za-z][\w-]*)(.*)$/;
const ARGUMENT = /([A-Za-z_][\w]*)=(?:"([^"]*)"|'([^']*)'|(\S*))|"([^"]*)"|'([^']*)'|(\S+)/g;

function docLines(comment: string): string[] {
  return comment.split('\n').map((line) => line.replace(/^\s*\*?\s?/, '').trim());
}

/**
 * Parse the arguments after a tag name
 */
export function parseTagArguments(text: string): Record<string, string> {
  const values: Record<string, string> = {};
  const positional: string[] = [];

  for (const match of text.matchAll(ARGUMENT)) {
    const [, key, doubleQuoted, singleQuoted, bare, loneDouble, loneSingle, loneBare] = match;
    if (key !== undefined) {
      values[key] = doubleQuoted ?? singleQuoted ?? bare ?? '';
    } else {
      positional.push(loneDouble ?? loneSingle ?? loneBare ?? '');
    }
  }

  if (positional.length > 0) {
    values[POSITIONAL] = positional.join(' ');
  }
  return values;
}

/**
 * Annotations found in one comment block
 */
export function parseJSDoc(comment: string): Annotation[] {
  const annotations: Annotation[] = [];
  for (const line of docLines(comment)) {
    const match = TAG_LINE.exec(line);
    if (!match) continue;
    const [, name, rest] = match;
    if (name === undefined) continue;
    annotations.push({ name, values: parseTagArguments(rest ?? '') });
  }
  return annotations;
}

/**
 * Annotations from the JSDoc blocks attached before any of the given nodes
 */
export function annotationsOf(...nodes: Array<t.Node | null | undefined>): Annotation[] {
  const annotations: Annotation[] = [];
  for (const node of nodes) {
    for (const comment of node?.leadingComments ?? []) {
      if (comment.type === 'CommentBlock' && comment.value.startsWith('*')) {
        annotations.push(...parseJSDoc(comment.value.slice(1)));
      }
    }
  }
  return annotations;
}
