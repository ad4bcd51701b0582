/**
 * Tests for Focus and navigator generation
 */

import { describe, it, expect } from 'vitest';
import { generateFromSource, navigatorClassName } from '../../src/generator/index.js';
import type { GenerationResult } from '../../src/generator/index.js';
import type { GeneratedArtifact } from '../../src/types/index.js';
import { Option } from '../../src/runtime/index.js';
import { affinePathAt, call, evaluate, pathAt, print, traversalPathAt } from '../helpers/evaluate.js';

class Street {
  constructor(
    readonly name: string,
    readonly number: number
  ) {}
}

class Address {
  constructor(
    readonly street: Street,
    readonly city: string
  ) {}
}

class Employee {
  constructor(
    readonly name: string,
    readonly address: Address
  ) {}
}

class Company {
  constructor(
    readonly name: string,
    readonly ceo: Employee,
    readonly hq: Address
  ) {}
}

const CLASSES = { Street, Address, Employee, Company };

const TYPES = `
export class Employee { constructor(readonly name: string, readonly address: Address) {} }
export class Address { constructor(readonly street: Street, readonly city: string) {} }
export class Street { constructor(readonly name: string, readonly number: number) {} }
`;

function company(focus: string): GenerationResult {
  return generateFromSource(`
    /** @generateFocus ${focus} */
    export class Company {
      constructor(readonly name: string, readonly ceo: Employee, readonly hq: Address) {}
    }
    ${TYPES}
  `);
}

function focusOf(result: GenerationResult): GeneratedArtifact {
  const [artifact] = result.artifacts;
  if (!artifact) throw new Error('no focus generated');
  return artifact;
}

const acme = new Company(
  'Acme',
  new Employee('Ada', new Address(new Street('Main', 1), 'London')),
  new Address(new Street('High', 20), 'Leeds')
);

describe('navigatorClassName', () => {
  it('should join the capitalised path', () => {
    expect(navigatorClassName('Company', ['ceo', 'address'])).toBe('CompanyFocusCeoAddressNavigator');
  });
});

describe('generateFocus', () => {
  it('should navigate one level by default', () => {
    const result = company('');
    expect(result.diagnostics).toEqual([]);
    const focus = focusOf(result);
    expect(focus.className).toBe('CompanyFocus');
    expect(focus.members.map((m) => [m.name, m.role])).toEqual([
      ['name', 'focus'],
      ['ceo', 'navigator'],
      ['hq', 'navigator'],
    ]);
    expect(focus.navigators.map((n) => n.className)).toEqual(['CompanyFocusCeoNavigator', 'CompanyFocusHqNavigator']);

    const ceo = focus.navigators[0];
    expect(ceo?.methods.map((m) => [m.name, m.role])).toEqual([
      ['get', 'delegate'],
      ['set', 'delegate'],
      ['modify', 'delegate'],
      ['toLens', 'delegate'],
      ['toPath', 'delegate'],
      ['name', 'focus'],
      ['address', 'focus'],
    ]);
  });

  it('should list nested navigators in pre-order', () => {
    const focus = focusOf(company('maxDepth=3'));
    expect(focus.navigators.map((n) => n.className)).toEqual([
      'CompanyFocusCeoNavigator',
      'CompanyFocusCeoAddressNavigator',
      'CompanyFocusCeoAddressStreetNavigator',
      'CompanyFocusHqNavigator',
      'CompanyFocusHqStreetNavigator',
    ]);
    expect(focus.navigators[2]).toMatchObject({ path: ['ceo', 'address', 'street'], targetTypeName: 'Street' });
  });

  it('should never compose paths longer than the maximum depth', () => {
    const chain = generateFromSource(`
      /** @generateFocus maxDepth=2 */
      export class A { constructor(readonly next: B) {} }
      export class B { constructor(readonly next: C) {} }
      export class C { constructor(readonly next: D) {} }
      export class D { constructor(readonly value: number) {} }
    `);
    const focus = focusOf(chain);
    expect(focus.navigators.map((n) => n.path)).toEqual([['next'], ['next', 'next']]);
    expect(Math.max(...focus.navigators.map((n) => n.path.length))).toBe(2);

    const hops = [focus.members, ...focus.navigators.map((n) => n.methods)].map(
      (methods) => methods.find((m) => m.name === 'next')?.role
    );
    expect(hops).toEqual(['navigator', 'navigator', 'focus']);
  });

  it('should let excludeFields win over includeFields', () => {
    const focus = focusOf(company('includeFields=ceo,hq excludeFields=hq'));
    expect(focus.members.map((m) => [m.name, m.role])).toEqual([
      ['name', 'focus'],
      ['ceo', 'navigator'],
      ['hq', 'focus'],
    ]);
    expect(focus.navigators.map((n) => n.className)).toEqual(['CompanyFocusCeoNavigator']);
  });

  it('should only navigate included root fields', () => {
    const focus = focusOf(company('includeFields=hq'));
    expect(focus.navigators.map((n) => n.className)).toEqual(['CompanyFocusHqNavigator']);
  });

  it('should not navigate into a type already on the path', () => {
    const result = generateFromSource(`
      /** @generateFocus maxDepth=5 */
      export class Owner { constructor(readonly name: string, readonly pet: Pet, readonly self: Owner) {} }
      export class Pet { constructor(readonly owner: Owner, readonly name: string) {} }
    `);
    const focus = focusOf(result);
    expect(focus.members.map((m) => [m.name, m.role])).toEqual([
      ['name', 'focus'],
      ['pet', 'navigator'],
      ['self', 'focus'],
    ]);
    expect(focus.navigators.map((n) => n.className)).toEqual(['OwnerFocusPetNavigator']);
    expect(focus.navigators[0]?.methods.find((m) => m.name === 'owner')?.role).toBe('focus');
  });

  it('should not navigate into generic or non-product types', () => {
    const focus = focusOf(
      generateFromSource(`
        /** @generateFocus */
        export class Holder { constructor(readonly pair: Pair<string>, readonly kind: Kind, readonly bean: Bean) {} }
        export class Pair<T> { constructor(readonly left: T) {} }
        export enum Kind { A, B }
        export class Bean { label = ''; }
      `)
    );
    expect(focus.members.map((m) => m.role)).toEqual(['focus', 'focus', 'focus']);
    expect(focus.navigators).toEqual([]);
  });

  it('should warn about and skip fields that collide with navigator methods', () => {
    const result = generateFromSource(`
      /** @generateFocus */
      export class Shelf { constructor(readonly box: Box) {} }
      export class Box { constructor(readonly get: number, readonly label: string) {} }
    `);
    expect(result.diagnostics).toEqual([
      {
        severity: 'warning',
        category: 'unsupported-type',
        message: "Field 'get' of Box collides with a navigator method; ShelfFocusBoxNavigator has no accessor for it",
        typeName: 'Shelf',
        memberName: 'get',
      },
    ]);
    const navigator = focusOf(result).navigators[0];
    expect(navigator?.methods.filter((m) => m.role !== 'delegate').map((m) => m.name)).toEqual(['label']);
  });
});

describe('generated navigators', () => {
  const { artifacts } = company('maxDepth=3');
  const CompanyFocus = evaluate(artifacts, CLASSES)['CompanyFocus'];

  it('should read and write through a root path', () => {
    const name = pathAt(CompanyFocus, 'name');
    expect(name.get(acme)).toBe('Acme');
    expect(name.set('Initech', acme)).toEqual(new Company('Initech', acme.ceo, acme.hq));
  });

  it('should delegate get, set and modify to the wrapped path', () => {
    const ceo = call(CompanyFocus, 'ceo');
    expect(call(ceo, 'get', acme)).toBe(acme.ceo);

    const grace = new Employee('Grace', acme.ceo.address);
    expect(call(ceo, 'set', grace, acme)).toEqual(new Company('Acme', grace, acme.hq));
    expect(call(ceo, 'modify', (e: Employee) => new Employee(e.name.toUpperCase(), e.address), acme)).toEqual(
      new Company('Acme', new Employee('ADA', acme.ceo.address), acme.hq)
    );
  });

  it('should agree with its own path and lens', () => {
    const ceo = call(CompanyFocus, 'ceo');
    const path = pathAt(ceo, 'toPath');
    const grace = new Employee('Grace', acme.ceo.address);
    expect(path.get(acme)).toBe(call(ceo, 'get', acme));
    expect(path.toLens().set(grace, acme)).toEqual(call(ceo, 'set', grace, acme));
    expect(pathAt(ceo, 'toPath').toLens().get(acme)).toBe(acme.ceo);
  });

  it('should navigate several levels deep', () => {
    const street = call(call(call(CompanyFocus, 'ceo'), 'address'), 'street');
    const number = pathAt(street, 'number');
    expect(number.get(acme)).toBe(1);

    const renumbered = number.set(99, acme);
    expect(renumbered).toEqual(
      new Company('Acme', new Employee('Ada', new Address(new Street('Main', 99), 'London')), acme.hq)
    );
    expect(acme.ceo.address.street.number).toBe(1);
  });

  it('should reach leaf fields through nested navigators', () => {
    const streetName = pathAt(call(call(CompanyFocus, 'hq'), 'street'), 'name');
    expect(streetName.get(acme)).toBe('High');
    expect(streetName.modify((s) => `${String(s)} St`, acme)).toEqual(
      new Company('Acme', acme.ceo, new Address(new Street('High St', 20), 'Leeds'))
    );
  });
});

class Line {
  constructor(
    readonly sku: string,
    readonly quantity: number
  ) {}
}

class Shipping {
  constructor(
    readonly carrier: string,
    readonly tracking: readonly string[]
  ) {}
}

class Order {
  constructor(
    readonly id: string,
    readonly lines: Line[],
    readonly tags: ReadonlySet<string>,
    readonly note: Option<string>,
    readonly coupon: string | undefined,
    readonly shipping: Shipping,
    readonly giftTo?: string
  ) {}
}

const ORDER = `
  /** @generateFocus */
  export class Order {
    constructor(
      readonly id: string,
      readonly lines: Line[],
      readonly tags: ReadonlySet<string>,
      readonly note: Option<string>,
      readonly coupon: string | undefined,
      readonly shipping: Shipping,
      readonly giftTo?: string
    ) {}
  }
  export class Line { constructor(readonly sku: string, readonly quantity: number) {} }
  export class Shipping { constructor(readonly carrier: string, readonly tracking: readonly string[]) {} }
`;

describe('path widening', () => {
  const result = generateFromSource(ORDER);
  const focus = focusOf(result);
  const OrderFocus = evaluate(result.artifacts, { Line, Shipping, Order })['OrderFocus'];

  const order = new Order(
    'o-1',
    [new Line('pen', 1), new Line('ink', 2)],
    new Set(['gift']),
    Option.some('fragile'),
    undefined,
    new Shipping('post', ['t-1', 't-2'])
  );

  it('should widen leaf paths by what the field may hold', () => {
    expect(result.diagnostics).toEqual([]);
    expect(focus.members.map((m) => [m.name, m.role, print(m.returnType)])).toEqual([
      ['id', 'focus', 'FocusPath<Order, string>'],
      ['lines', 'focus', 'TraversalPath<Order, Line>'],
      ['tags', 'focus', 'TraversalPath<Order, string>'],
      ['note', 'focus', 'AffinePath<Order, string>'],
      ['coupon', 'focus', 'AffinePath<Order, string>'],
      ['shipping', 'navigator', 'OrderFocusShippingNavigator<Order>'],
      ['giftTo', 'focus', 'AffinePath<Order, string>'],
    ]);
  });

  it('should widen through the matching path method', () => {
    const bodies = new Map(focus.members.map((m) => [m.name, print(m.body)]));
    expect(bodies.get('lines')?.endsWith('.each(Traversals.forArray())')).toBe(true);
    expect(bodies.get('tags')?.endsWith('.each(Traversals.forSet())')).toBe(true);
    expect(bodies.get('note')?.endsWith('.some()')).toBe(true);
    expect(bodies.get('coupon')?.endsWith('.nullable()')).toBe(true);
    expect(bodies.get('giftTo')?.endsWith('.nullable()')).toBe(true);
  });

  it('should widen collection fields inside navigators', () => {
    const tracking = focus.navigators[0]?.methods.find((m) => m.name === 'tracking');
    expect(tracking && print(tracking.returnType)).toBe('TraversalPath<S, string>');
    expect(tracking && print(tracking.body)).toMatch(/^this\.delegate\.via\(.*\)\.each\(Traversals\.forArray\(\)\)$/s);
  });

  it('should read and update every element of a collection field', () => {
    const lines = traversalPathAt(OrderFocus, 'lines');
    expect(lines.getAll(order)).toEqual(order.lines);

    const doubled = lines.modifyAll((line) => (line instanceof Line ? new Line(line.sku, line.quantity * 2) : line), order);
    expect(doubled).toBeInstanceOf(Order);
    expect(doubled).toMatchObject({ id: 'o-1', lines: [new Line('pen', 2), new Line('ink', 4)] });
    expect(order.lines[0]?.quantity).toBe(1);

    expect(traversalPathAt(OrderFocus, 'tags').getAll(order)).toEqual(['gift']);
  });

  it('should reach a present Option value and skip an absent one', () => {
    const note = affinePathAt(OrderFocus, 'note');
    expect(note.preview(order)).toEqual(Option.some('fragile'));
    expect(note.set('glass', order)).toMatchObject({ note: Option.some('glass') });

    const plain = new Order('o-2', [], new Set<string>(), Option.none(), undefined, order.shipping);
    expect(note.preview(plain)).toEqual(Option.none());
    expect(note.set('glass', plain)).toBe(plain);
  });

  it('should reach nullable and optional fields only when they hold a value', () => {
    const coupon = affinePathAt(OrderFocus, 'coupon');
    expect(coupon.preview(order)).toEqual(Option.none());
    expect(coupon.set('SAVE10', order)).toBe(order);

    const discounted = new Order('o-3', [], new Set<string>(), Option.none(), 'SAVE10', order.shipping, 'Ada');
    expect(coupon.preview(discounted)).toEqual(Option.some('SAVE10'));
    expect(coupon.modify((code) => `${String(code)}!`, discounted)).toMatchObject({ coupon: 'SAVE10!' });

    const giftTo = affinePathAt(OrderFocus, 'giftTo');
    expect(giftTo.preview(order)).toEqual(Option.none());
    expect(giftTo.set('Grace', discounted)).toMatchObject({ giftTo: 'Grace', coupon: 'SAVE10' });
  });

  it('should traverse a collection below a navigator', () => {
    const tracking = traversalPathAt(call(OrderFocus, 'shipping'), 'tracking');
    expect(tracking.getAll(order)).toEqual(['t-1', 't-2']);
    expect(tracking.setAll('t-0', order)).toMatchObject({ shipping: new Shipping('post', ['t-0', 't-0']) });
  });
});
