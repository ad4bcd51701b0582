/**
 * Tests for prism and traversal hint resolution
 */

import { describe, it, expect } from 'vitest';
import type * as t from '@babel/types';
import {
  enumConstantPrism,
  referenceExpression,
  resolvePrismHint,
  resolveTraversalHint,
} from '../../src/strategy/index.js';
import { createTypeRegistry } from '../../src/introspection/index.js';
import { Lens, Option } from '../../src/runtime/index.js';
import { OpticsGenerationError, PrismHints, TraversalHints } from '../../src/types/index.js';
import { Decls, Refs } from '../../src/utils/index.js';
import { asPrism, asTraversal, evaluateExpression, print } from '../helpers/evaluate.js';

class Circle {
  constructor(readonly radius: number) {}
}

class Square {
  constructor(readonly side: number) {}
}

function previewBody(prism: t.CallExpression): string {
  const [preview] = prism.arguments;
  if (preview?.type !== 'ArrowFunctionExpression') {
    throw new Error('expected an arrow preview');
  }
  return print(preview.body);
}

const shapes = {
  sourceType: Refs.named('Shape'),
  focusType: Refs.named('Circle'),
};

describe('resolvePrismHint', () => {
  describe('InstanceOf', () => {
    it('should recognise the variant by instanceof', () => {
      const expression = resolvePrismHint(PrismHints.instanceOf(), shapes);
      expect(previewBody(expression)).toBe('source instanceof Circle ? Option.some(source) : Option.none()');

      const prism = asPrism(evaluateExpression(expression, { Circle }));
      const circle = new Circle(2);
      expect(prism.preview(circle)).toEqual(Option.some(circle));
      expect(prism.preview(new Square(1))).toEqual(Option.none());
      expect(prism.review(circle)).toBe(circle);
    });

    it('should prefer an explicit target over the focus type', () => {
      const expression = resolvePrismHint(PrismHints.instanceOf(Refs.named('geometry.Square')), shapes);
      expect(previewBody(expression)).toContain('source instanceof geometry.Square');
    });

    it('should check the target against the registry', () => {
      const registry = createTypeRegistry([
        Decls.alias('Shape', Refs.union(Refs.named('Circle'), Refs.named('Square'))),
        Decls.record('Circle', [['radius', Refs.number]]),
        Decls.record('Square', [['side', Refs.number]]),
        Decls.record('Triangle', [['base', Refs.number]]),
      ]);
      expect(() => resolvePrismHint(PrismHints.instanceOf(), { ...shapes, registry })).not.toThrow();
      expect(() =>
        resolvePrismHint(PrismHints.instanceOf(Refs.named('Triangle')), { ...shapes, registry })
      ).toThrow('Triangle is not a subtype of Shape');
    });

    it('should reject a target that is not a class reference', () => {
      expect(() => resolvePrismHint(PrismHints.instanceOf(Refs.string), shapes)).toThrow(
        'InstanceOf target string is not a class reference'
      );
    });
  });

  describe('MatchWhen', () => {
    it('should call the predicate and the getter', () => {
      const expression = resolvePrismHint(PrismHints.matchWhen('isCircle', 'asCircle'), shapes);
      expect(previewBody(expression)).toBe('source.isCircle() ? Option.some(source.asCircle()) : Option.none()');
    });

    it('should require both predicate and getter', () => {
      expect(() => resolvePrismHint(PrismHints.matchWhen('isCircle', ''), shapes)).toThrow(
        'requires both predicate and getter'
      );
    });
  });

  it('should reject the None hint', () => {
    expect(() => resolvePrismHint(PrismHints.none, shapes)).toThrow(OpticsGenerationError);
  });
});

describe('enumConstantPrism', () => {
  const Color = { Red: 0, Green: 1 };

  it('should match exactly one constant', () => {
    const expression = enumConstantPrism('Color', 'Red');
    expect(previewBody(expression)).toBe('source === Color.Red ? Option.some(source) : Option.none()');

    const prism = asPrism(evaluateExpression(expression, { Color }));
    expect(prism.matches(Color.Red)).toBe(true);
    expect(prism.matches(Color.Green)).toBe(false);
    expect(prism.review(Color.Red)).toBe(Color.Red);
  });
});

describe('referenceExpression', () => {
  it('should call a dotted reference ending in ()', () => {
    const expression = referenceExpression('Traversals.forList()');
    expect(expression.type).toBe('CallExpression');
    expect(print(expression)).toBe('Traversals.forList()');
  });

  it('should keep a dotted reference without a call', () => {
    const expression = referenceExpression('MyTraversals.items');
    expect(expression.type).toBe('MemberExpression');
    expect(print(expression)).toBe('MyTraversals.items');
  });

  it('should call a bare function reference', () => {
    expect(print(referenceExpression(' everyItem() '))).toBe('everyItem()');
  });

  it('should parse anything else as an expression', () => {
    expect(print(referenceExpression('Traversals.forList().andThen(nested)'))).toBe(
      'Traversals.forList().andThen(nested)'
    );
  });
});

describe('resolveTraversalHint', () => {
  interface Order {
    readonly id: string;
    readonly items: readonly number[];
  }

  const OrderOptics = {
    items: () => Lens.of((order: Order) => order.items, (order: Order, items: readonly number[]) => ({ ...order, items })),
  };

  it('should use a TraverseWith reference as is', () => {
    const expression = resolveTraversalHint(TraversalHints.traverseWith('Traversals.forSet()'), {
      ownerClassName: 'OrderOptics',
    });
    expect(print(expression)).toBe('Traversals.forSet()');
  });

  it('should compose a ThroughField lens with its traversal', () => {
    const expression = resolveTraversalHint(TraversalHints.throughField('items', 'Traversals.forList()'), {
      ownerClassName: 'OrderOptics',
    });
    expect(print(expression)).toBe('OrderOptics.items().asTraversal().andThen(Traversals.forList())');

    const traversal = asTraversal(evaluateExpression(expression, { OrderOptics }));
    const order: Order = { id: 'o-1', items: [1, 2, 3] };
    expect(traversal.getAll(order)).toEqual([1, 2, 3]);
    expect(traversal.modifyAll((n) => Number(n) * 10, order)).toEqual({ id: 'o-1', items: [10, 20, 30] });
  });

  it('should reject a ThroughField hint without a traversal', () => {
    expect(() =>
      resolveTraversalHint(TraversalHints.throughField('items'), { ownerClassName: 'OrderOptics' })
    ).toThrow("Traversal not specified and not auto-detected for field 'items' of OrderOptics");
  });

  it('should reject the None hint', () => {
    expect(() => resolveTraversalHint(TraversalHints.none, { ownerClassName: 'OrderOptics' })).toThrow(
      'No traversal hint for OrderOptics'
    );
  });
});
