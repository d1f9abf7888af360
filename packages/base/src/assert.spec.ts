import * as assert from './assert.js';

describe('assertions', () => {
  afterEach(() => assert.setEnabled(true));

  test('failures throw', () => {
    expect(() => assert.gt(1, 1)).toThrow('[Failed assertion] Expected 1 to be > 1');
    expect(() => assert.bounds([1, 2], 2)).toThrow('[Failed assertion] Expected 2 to be a valid element');
    expect(() => assert.inRange(3, 0, 2, 'out of range')).toThrow('[Failed assertion] out of range');
    expect(() => assert.le(1, 2)).not.toThrow();
  });

  test('can be switched off', () => {
    assert.setEnabled(false);

    expect(assert.assertionsEnabled()).toBe(false);
    expect(() => assert.gte(0, 1)).not.toThrow();
  });
});
