/**
 * Tests for optics spec interface analysis
 */

import { describe, it, expect } from 'vitest';
import { analyseSpec, specClassName, specSourceType } from '../../src/analysis/index.js';
import { createTypeRegistry, readDeclarations } from '../../src/introspection/index.js';
import { CopyStrategies, PrismHints, TraversalHints } from '../../src/types/index.js';
import { Refs } from '../../src/utils/index.js';

const MODEL = `
export class Item {
  constructor(readonly sku: string) {}
}

export class Order {
  constructor(
    readonly id: string,
    readonly items: readonly Item[],
    readonly tags: Set<string>,
    readonly note: string,
  ) {}
}

export type Shape = Circle | Square;
export class Circle { constructor(readonly radius: number) {} }
export class Square { constructor(readonly side: number) {} }
`;

function analyse(spec: string) {
  const { declarations, diagnostics } = readDeclarations(MODEL + spec);
  expect(diagnostics).toEqual([]);
  const declaration = declarations.find((d) => d.declarationKind === 'interface');
  if (declaration?.declarationKind !== 'interface') {
    throw new Error('no spec interface in source');
  }
  return analyseSpec(declaration, createTypeRegistry(declarations));
}

function messages(spec: string): string[] {
  return analyse(spec).diagnostics.map((d) => d.message);
}

describe('specClassName', () => {
  it('should strip a Spec suffix', () => {
    expect(specClassName('OrderOpticsSpec')).toBe('OrderOptics');
  });

  it('should append Impl otherwise', () => {
    expect(specClassName('OrderOptics')).toBe('OrderOpticsImpl');
    expect(specClassName('Spec')).toBe('SpecImpl');
  });
});

describe('analyseSpec', () => {
  it('should read copy strategies and traversal hints', () => {
    const { analysis, diagnostics } = analyse(`
      /** @importOptics */
      export interface OrderOpticsSpec extends OpticsSpec<Order> {
        /** @viaConstructor parameterOrder=id,items,tags,note */
        id(): Lens<Order, string>;
        /**
         * @viaConstructor parameterOrder=id,items,tags,note
         */
        items(): Lens<Order, readonly Item[]>;
        /** @wither withNote getter=noteText */
        note(): Lens<Order, string>;
        /** @throughField items */
        eachItem(): Traversal<Order, Item>;
        /** @throughField field=items traversal=Traversals.forList() */
        listedItems(): Fold<Order, Item>;
      }
    `);

    expect(diagnostics).toEqual([]);
    expect(analysis?.className).toBe('OrderOptics');
    expect(analysis?.sourceType).toEqual(Refs.named('Order'));
    expect(analysis?.methods.map((m) => [m.name, m.opticKind])).toEqual([
      ['id', 'lens'],
      ['items', 'lens'],
      ['note', 'lens'],
      ['eachItem', 'traversal'],
      ['listedItems', 'fold'],
    ]);

    const [id, items, note, eachItem, listedItems] = analysis?.methods ?? [];
    expect(id?.copyStrategy).toEqual(CopyStrategies.viaConstructor(['id', 'items', 'tags', 'note']));
    expect(items?.focusType).toEqual(Refs.array(Refs.named('Item'), true));
    expect(note?.copyStrategy).toEqual(CopyStrategies.wither('withNote', 'noteText'));
    expect(eachItem?.traversalHint).toEqual(TraversalHints.throughField('items', 'Traversals.forArray()'));
    expect(listedItems?.traversalHint).toEqual(TraversalHints.throughField('items', 'Traversals.forList()'));
  });

  it('should read prism hints', () => {
    const { analysis, diagnostics } = analyse(`
      /** @importOptics */
      interface ShapeOptics extends OpticsSpec<Shape> {
        /** @instanceOf Circle */
        circle(): Prism<Shape, Circle>;
        /** @instanceOf */
        square(): Prism<Shape, Square>;
        /** @matchWhen predicate=isLarge getter=asSquare */
        large(): Prism<Shape, Square>;
      }
    `);

    expect(diagnostics).toEqual([]);
    expect(analysis?.className).toBe('ShapeOpticsImpl');
    expect(analysis?.methods.map((m) => m.prismHint)).toEqual([
      PrismHints.instanceOf(Refs.named('Circle')),
      PrismHints.instanceOf(),
      PrismHints.matchWhen('isLarge', 'asSquare'),
    ]);
  });

  it('should accept getter, iso and affine methods without hints', () => {
    const { analysis, diagnostics } = analyse(`
      interface OrderViews extends OpticsSpec<Order> {
        size(): Getter<Order, number>;
      }
    `);
    expect(diagnostics).toEqual([]);
    expect(analysis?.methods[0]?.opticKind).toBe('getter');
  });

  it('should report a missing source type', () => {
    const result = analyse(`
      interface Loose {
        /** @wither */
        id(): Lens<Order, string>;
      }
    `);
    expect(result.analysis).toBeUndefined();
    expect(result.diagnostics).toHaveLength(1);
    expect(result.diagnostics[0]).toMatchObject({ category: 'invalid-spec', typeName: 'Loose' });
    expect(result.diagnostics[0]?.message).toContain('Cannot determine source type for Loose');
  });

  it('should report methods with parameters', () => {
    expect(messages(`
      interface Bad extends OpticsSpec<Order> {
        /** @wither */
        id(prefix: string): Lens<Order, string>;
      }
    `)).toEqual(["Optic method 'id' must have no parameters"]);
  });

  it('should report methods that return no optic', () => {
    const [message] = messages(`
      interface Bad extends OpticsSpec<Order> {
        id(): string;
      }
    `);
    expect(message).toBe("Optic method 'id' must return one of Lens, Prism, Traversal, Affine, Iso, Getter, Fold");
  });

  it('should report an optic without a focus type', () => {
    const [message] = messages(`
      interface Bad extends OpticsSpec<Order> {
        /** @wither */
        id(): Lens<Order>;
      }
    `);
    expect(message).toContain("Cannot determine focus type for 'id'");
  });

  it('should report a lens without a copy strategy', () => {
    const result = analyse(`
      interface Bad extends OpticsSpec<Order> {
        id(): Lens<Order, string>;
      }
    `);
    expect(result.diagnostics[0]).toMatchObject({ category: 'missing-annotation', memberName: 'id' });
    expect(result.diagnostics[0]?.message).toContain('requires a copy strategy annotation');
  });

  it('should report a lens with two copy strategies', () => {
    const [message] = messages(`
      interface Bad extends OpticsSpec<Order> {
        /**
         * @wither
         * @viaBuilder
         */
        id(): Lens<Order, string>;
      }
    `);
    expect(message).toBe("Lens 'id' has more than one copy strategy annotation");
  });

  it('should report a parameter order that omits the field', () => {
    const [message] = messages(`
      interface Bad extends OpticsSpec<Order> {
        /** @viaConstructor parameterOrder=id,items */
        note(): Lens<Order, string>;
      }
    `);
    expect(message).toBe("parameterOrder of Lens 'note' does not name the field 'note'");
  });

  it('should report an instanceOf target outside the sum', () => {
    const result = analyse(`
      interface Bad extends OpticsSpec<Shape> {
        /** @instanceOf Item */
        item(): Prism<Shape, Item>;
      }
    `);
    expect(result.diagnostics[0]).toMatchObject({ category: 'invalid-subtype' });
    expect(result.diagnostics[0]?.message).toBe("Item is not a subtype of Shape in Prism 'item'");
  });

  it('should report incomplete and missing prism hints', () => {
    expect(messages(`
      interface Bad extends OpticsSpec<Shape> {
        /** @matchWhen predicate=isLarge */
        large(): Prism<Shape, Square>;
        circle(): Prism<Shape, Circle>;
      }
    `)).toEqual([
      "@matchWhen on Prism 'large' requires both predicate and getter",
      "Prism 'circle' requires a prism hint annotation (@instanceOf or @matchWhen)",
    ]);
  });

  it('should report a traversal without a hint', () => {
    const [message] = messages(`
      interface Bad extends OpticsSpec<Order> {
        everything(): Traversal<Order, Item>;
      }
    `);
    expect(message).toBe("Traversal 'everything' requires a traversal hint annotation (@traverseWith or @throughField)");
  });

  it('should report a throughField without a sibling lens', () => {
    const [message] = messages(`
      interface Bad extends OpticsSpec<Order> {
        /** @throughField tags */
        eachTag(): Traversal<Order, string>;
      }
    `);
    expect(message).toBe("Traversal 'eachTag' goes through field 'tags', which needs a Lens method 'tags' in Bad");
  });

  it('should report a throughField on a field that is not a container', () => {
    const result = analyse(`
      interface Bad extends OpticsSpec<Order> {
        /** @viaConstructor parameterOrder=id,items,tags,note */
        note(): Lens<Order, string>;
        /** @throughField note */
        noteChars(): Fold<Order, string>;
      }
    `);
    expect(result.diagnostics).toHaveLength(1);
    expect(result.diagnostics[0]).toMatchObject({ category: 'missing-annotation', memberName: 'noteChars' });
    expect(result.diagnostics[0]?.message).toContain("Cannot auto-detect traversal for field 'note' of Order");
  });

  it('should report one diagnostic per offending method', () => {
    expect(messages(`
      interface Bad extends OpticsSpec<Order> {
        id(): Lens<Order, string>;
        note(): Lens<Order, string>;
        /** @wither */
        tags(): Lens<Order, Set<string>>;
      }
    `)).toHaveLength(2);
  });
});

describe('specSourceType', () => {
  it('should ignore unrelated parents', () => {
    const { declarations } = readDeclarations('interface S extends Base<Order>, OpticsSpec<Item> {}');
    const [declaration] = declarations;
    if (declaration?.declarationKind !== 'interface') throw new Error('expected an interface');
    expect(specSourceType(declaration)).toEqual(Refs.named('Item'));
  });
});
