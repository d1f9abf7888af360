import { assignDeep } from './assignDeep.js';

test('deeply assigns properties of additional objects to the first object', () => {
  const one = { b: { c: { d: 'e' } } };
  const two = { b: { c: { f: 'g', j: 'i' } } };

  const result = assignDeep(one, two);

  expect(result).toEqual({ b: { c: { d: 'e', f: 'g', j: 'i' } } });
  expect(result).toBe(one);
});

test('deeply assigns properties from left to right', () => {
  const one = { b: { c: { d: 'e' } } };
  const two = { b: { c: { f: 'g' } } };
  const three = { b: { c: 1 } };

  expect(assignDeep(one, two, three)).toEqual({ b: { c: 1 } });
});

test('reassigns primitives with objects and objects with primitives', () => {
  expect(assignDeep({ b: 0 }, { b: { c: 1 } })).toEqual({ b: { c: 1 } });
  expect(assignDeep({ b: { c: 1 } }, { b: 0, c: 0 })).toEqual({ b: 0, c: 0 });
});

test('replaces arrays instead of merging them', () => {
  const one = { grid: { sigmas: [0.5, 1] } };
  const two = { grid: { sigmas: [2] } };

  expect(assignDeep(one, two)).toEqual({ grid: { sigmas: [2] } });
});

test('assigns null values', () => {
  expect(assignDeep({ wtThresh: 1e-3 }, { wtThresh: null })).toEqual({ wtThresh: null });
});

test('ignores sources which are not plain objects', () => {
  const one = { b: { c: 'd' } };

  expect(assignDeep(one, 5, undefined, [1, 2])).toEqual({ b: { c: 'd' } });
});

test('does not modify the sources', () => {
  const defaults = { a: 0, nested: { b: 1 } };
  const merged = assignDeep({}, defaults, { nested: { b: 2 } });

  expect(merged).toEqual({ a: 0, nested: { b: 2 } });
  expect(defaults).toEqual({ a: 0, nested: { b: 1 } });
});
