/**
 * Tests for container classification and standard traversals
 */

import { describe, it, expect } from 'vitest';
import { classifyContainer, containerFamilyNames } from '../../src/analysis/index.js';
import { STANDARD_TRAVERSALS, standardTraversal } from '../../src/strategy/index.js';
import { Refs } from '../../src/utils/index.js';

describe('classifyContainer', () => {
  it('should classify list families', () => {
    for (const name of ['Array', 'ReadonlyArray']) {
      expect(classifyContainer(Refs.named(name, Refs.string))).toEqual({ kind: 'List', elementType: Refs.string });
    }
  });

  it('should classify array syntax as Array', () => {
    expect(classifyContainer(Refs.array(Refs.number))).toEqual({ kind: 'Array', elementType: Refs.number });
    expect(classifyContainer(Refs.array(Refs.number, true))?.kind).toBe('Array');
  });

  it('should classify sets and optionals', () => {
    expect(classifyContainer(Refs.named('Set', Refs.string))?.kind).toBe('Set');
    expect(classifyContainer(Refs.named('ReadonlySet', Refs.string))?.kind).toBe('Set');
    expect(classifyContainer(Refs.named('Option', Refs.string))?.kind).toBe('Optional');
  });

  it('should leave user-defined wrappers named like containers alone', () => {
    for (const name of ['Maybe', 'Optional', 'List']) {
      expect(classifyContainer(Refs.named(name, Refs.string))).toBeUndefined();
    }
  });

  it('should take the value type of a map as element type', () => {
    const map = Refs.named('Map', Refs.string, Refs.named('Order'));
    expect(classifyContainer(map)).toEqual({ kind: 'Map', keyType: Refs.string, elementType: Refs.named('Order') });
  });

  it('should reject raw family references', () => {
    expect(classifyContainer(Refs.named('Array'))).toBeUndefined();
    expect(classifyContainer(Refs.named('Map'))).toBeUndefined();
  });

  it('should reject the wrong number of type arguments', () => {
    expect(classifyContainer(Refs.named('Map', Refs.string))).toBeUndefined();
    expect(classifyContainer(Refs.named('Set', Refs.string, Refs.string))).toBeUndefined();
  });

  it('should not classify other types', () => {
    expect(classifyContainer(Refs.string)).toBeUndefined();
    expect(classifyContainer(Refs.named('Person'))).toBeUndefined();
    expect(classifyContainer(Refs.union(Refs.string, Refs.number))).toBeUndefined();
  });

  it('should list every family name', () => {
    expect(containerFamilyNames()).toContain('ReadonlyMap');
    expect(containerFamilyNames()).not.toContain('Record');
  });
});

describe('standard traversals', () => {
  it('should map each container kind to a distinct reference', () => {
    const references = Object.values(STANDARD_TRAVERSALS);
    expect(references).toHaveLength(5);
    expect(new Set(references).size).toBe(5);
  });

  it('should name the runtime traversal for a kind', () => {
    expect(standardTraversal('List')).toBe('Traversals.forList()');
    expect(standardTraversal('Map')).toBe('Traversals.forMapValues()');
    expect(standardTraversal('Array')).toBe('Traversals.forArray()');
  });
});
