/**
 * Tests for lens, prism and optics spec generation
 */

import { describe, it, expect } from 'vitest';
import { generateFromSource } from '../../src/generator/index.js';
import type { GeneratedArtifact } from '../../src/types/index.js';
import { Option, Traversal } from '../../src/runtime/index.js';
import { call, evaluate, foldAt, lensAt, prismAt, print, traversalAt } from '../helpers/evaluate.js';

class Person {
  constructor(
    readonly name: string,
    readonly age: number,
    readonly tags: readonly string[],
    readonly scores: Map<string, number>
  ) {}
}

class Temporal {
  constructor(
    private readonly _year: number,
    private readonly _month: number
  ) {}

  year(): number {
    return this._year;
  }

  month(): number {
    return this._month;
  }

  withYear(year: number): Temporal {
    return new Temporal(year, this._month);
  }

  withMonth(month: number): Temporal {
    return new Temporal(this._year, month);
  }
}

class Circle {
  constructor(readonly radius: number) {}
}

class Square {
  constructor(readonly side: number) {}
}

class Triangle {
  constructor(
    readonly base: number,
    readonly height: number
  ) {}
}

const Color = { Red: 'RED', DarkBlue: 'DARK_BLUE' } as const;

class Order {
  constructor(
    readonly id: string,
    readonly items: readonly string[]
  ) {}
}

const MODEL = `
/** @generateLenses */
export class Person {
  constructor(
    readonly name: string,
    readonly age: number,
    readonly tags: readonly string[],
    readonly scores: Map<string, number>,
  ) {}
}

/** @generateLenses */
export class Temporal {
  constructor(private readonly _year: number, private readonly _month: number) {}
  year(): number { return this._year; }
  month(): number { return this._month; }
  withYear(year: number): Temporal { return new Temporal(year, this._month); }
  withMonth(month: number): Temporal { return new Temporal(this._year, month); }
}

/** @generatePrisms */
export type Shape = Circle | Square | Triangle;
export class Circle { constructor(readonly radius: number) {} }
export class Square { constructor(readonly side: number) {} }
export class Triangle { constructor(readonly base: number, readonly height: number) {} }

/** @generatePrisms */
export enum Color { Red = 'RED', DarkBlue = 'DARK_BLUE' }
`;

const { artifacts, diagnostics } = generateFromSource(MODEL);
const bindings = evaluate(artifacts, { Person, Temporal, Circle, Square, Triangle, Color });

function artifact(className: string): GeneratedArtifact {
  const found = artifacts.find((a) => a.className === className);
  if (!found) throw new Error(`no artifact ${className}`);
  return found;
}

function memberBody(className: string, index: number): string {
  const method = artifact(className).members[index];
  if (!method) throw new Error(`no member ${index} in ${className}`);
  return print(method.body);
}

describe('generateLenses', () => {
  const PersonLenses = bindings['PersonLenses'];
  const ada = new Person('Ada', 36, ['math'], new Map([['chess', 1200]]));

  it('should generate exactly the requested artifacts', () => {
    expect(diagnostics).toEqual([]);
    expect(artifacts.map((a) => a.className)).toEqual(['PersonLenses', 'TemporalLenses', 'ShapePrisms', 'ColorPrisms']);
  });

  it('should generate a lens, an updater and container optics per field', () => {
    expect(artifact('PersonLenses').members.map((m) => [m.name, m.role])).toEqual([
      ['name', 'lens'],
      ['withName', 'updater'],
      ['age', 'lens'],
      ['withAge', 'updater'],
      ['tags', 'lens'],
      ['withTags', 'updater'],
      ['tagsTraversal', 'traversal'],
      ['tagsFold', 'fold'],
      ['scores', 'lens'],
      ['withScores', 'updater'],
      ['scoresTraversal', 'traversal'],
      ['scoresFold', 'fold'],
    ]);
  });

  it('should rebuild products through the constructor', () => {
    expect(memberBody('PersonLenses', 0)).toContain(
      '(source, newValue) => new Person(newValue, source.age, source.tags, source.scores)'
    );
  });

  it('should import the runtime names and types the members use', () => {
    const lenses = artifact('PersonLenses');
    expect(lenses.runtimeImports).toEqual(['Fold', 'Lens', 'Traversal', 'Traversals']);
    expect(lenses.typeImports).toEqual([{ name: 'Person', module: './model.js', typeOnly: false }]);
  });

  it('should obey the lens laws', () => {
    const name = lensAt(PersonLenses, 'name');
    expect(name.get(ada)).toBe('Ada');

    const renamed = name.set('Grace', ada);
    expect(renamed).toBeInstanceOf(Person);
    expect(name.get(renamed)).toBe('Grace');
    expect(name.set(name.get(ada), ada)).toEqual(ada);
    expect(name.set('Linus', name.set('Grace', ada))).toEqual(name.set('Linus', ada));
    expect(ada.name).toBe('Ada');
  });

  it('should update through the updater', () => {
    const older = call(PersonLenses, 'withAge', ada, 37);
    expect(older).toEqual(new Person('Ada', 37, ['math'], ada.scores));
  });

  it('should traverse array and map fields', () => {
    const tags = traversalAt(PersonLenses, 'tagsTraversal');
    expect(tags.modifyAll((tag) => String(tag).toUpperCase(), ada)).toEqual(
      new Person('Ada', 36, ['MATH'], ada.scores)
    );

    const scores = traversalAt(PersonLenses, 'scoresTraversal');
    expect(scores.getAll(ada)).toEqual([1200]);
    expect(foldAt(PersonLenses, 'tagsFold').getAll(ada)).toEqual(['math']);
  });

  it('should copy through withers for copy-mutable classes', () => {
    const TemporalLenses = bindings['TemporalLenses'];
    const year = lensAt(TemporalLenses, 'year');
    const start = new Temporal(2020, 5);

    const moved = year.set(2024, start);
    expect(moved).toBeInstanceOf(Temporal);
    expect(year.get(moved)).toBe(2024);
    expect(lensAt(TemporalLenses, 'month').get(moved)).toBe(5);
    expect(memberBody('TemporalLenses', 0)).toContain('source.withYear(newValue)');
  });
});

describe('generatePrisms', () => {
  const ShapePrisms = bindings['ShapePrisms'];

  it('should generate one prism per variant, named after it', () => {
    expect(artifact('ShapePrisms').members.map((m) => m.name)).toEqual(['circle', 'square', 'triangle']);
  });

  it('should match exactly one variant', () => {
    const shapes = [new Circle(1), new Square(2), new Triangle(3, 4)];
    const matches = ['circle', 'square', 'triangle'].map((name) =>
      shapes.map((shape) => prismAt(ShapePrisms, name).matches(shape))
    );
    expect(matches).toEqual([
      [true, false, false],
      [false, true, false],
      [false, false, true],
    ]);
  });

  it('should obey the prism laws', () => {
    const circle = prismAt(ShapePrisms, 'circle');
    const c = new Circle(2);
    expect(circle.preview(circle.review(c))).toEqual(Option.some(c));
    expect(circle.review(c)).toBe(c);
  });

  it('should generate one prism per enum constant', () => {
    const ColorPrisms = bindings['ColorPrisms'];
    expect(artifact('ColorPrisms').members.map((m) => m.name)).toEqual(['red', 'darkBlue']);
    expect(prismAt(ColorPrisms, 'darkBlue').matches(Color.DarkBlue)).toBe(true);
    expect(prismAt(ColorPrisms, 'darkBlue').matches(Color.Red)).toBe(false);
  });
});

describe('generateSpecClass', () => {
  const SPEC = `
export class Order {
  constructor(readonly id: string, readonly items: readonly string[]) {}
}

/** @importOptics */
export interface OrderOpticsSpec extends OpticsSpec<Order> {
  /** @viaConstructor parameterOrder=id,items */
  id(): Lens<Order, string>;
  /** @viaConstructor parameterOrder=id,items */
  items(): Lens<Order, readonly string[]>;
  /** @throughField items */
  eachItem(): Traversal<Order, string>;
  /** @throughField items */
  itemView(): Fold<Order, string>;
  /** @traverseWith OrderTraversals.items */
  listItems(): Traversal<Order, string>;
  /** @viaConstructor */
  reference(): Lens<Order, string>;
  size(): Getter<Order, number>;
}
`;
  const generated = generateFromSource(SPEC, { module: './order.js' });
  const OrderTraversals = {
    items: Traversal.of<Order, string>(
      (o) => o.items,
      (f, o) => new Order(o.id, o.items.map(f))
    ),
  };
  const OrderOptics = evaluate(generated.artifacts, { Order, OrderTraversals })['OrderOptics'];
  const order = new Order('o-1', ['pen', 'ink']);

  it('should generate a class named after the spec', () => {
    expect(generated.diagnostics).toEqual([]);
    expect(generated.artifacts.map((a) => [a.className, a.module])).toEqual([['OrderOptics', './order.js']]);
    expect(generated.artifacts[0]?.sourceTypeName).toBe('Order');
  });

  it('should build lenses from the copy strategy', () => {
    const id = lensAt(OrderOptics, 'id');
    expect(id.set('o-2', order)).toEqual(new Order('o-2', ['pen', 'ink']));
  });

  it('should build traversals and folds through a sibling lens', () => {
    expect(traversalAt(OrderOptics, 'eachItem').modifyAll((item) => `${String(item)}!`, order)).toEqual(
      new Order('o-1', ['pen!', 'ink!'])
    );
    expect(foldAt(OrderOptics, 'itemView').length(order)).toBe(2);
    expect(traversalAt(OrderOptics, 'listItems').getAll(order)).toEqual(['pen', 'ink']);
  });

  it('should fail an unordered ViaConstructor lens only when it is used', () => {
    const reference = lensAt(OrderOptics, 'reference');
    expect(() => reference.set('r', order)).toThrow(
      'ViaConstructor for Order.reference requires parameterOrder to be specified'
    );
  });

  it('should generate a throwing placeholder for unsupported optic kinds', () => {
    expect(() => call(OrderOptics, 'size')).toThrow('Getter optics are not yet supported in optics spec interfaces');
  });

  it('should generate prisms from prism hints', () => {
    const result = generateFromSource(`
      export type Shape = Circle | Square;
      export class Circle { constructor(readonly radius: number) {} }
      export class Square { constructor(readonly side: number) {} }

      /** @importOptics */
      export interface ShapeOpticsSpec extends OpticsSpec<Shape> {
        /** @instanceOf Circle */
        circle(): Prism<Shape, Circle>;
      }
    `);
    expect(result.diagnostics).toEqual([]);
    const ShapeOptics = evaluate(result.artifacts, { Circle, Square })['ShapeOptics'];
    expect(prismAt(ShapeOptics, 'circle').matches(new Circle(1))).toBe(true);
    expect(prismAt(ShapeOptics, 'circle').matches(new Square(1))).toBe(false);
  });
});
