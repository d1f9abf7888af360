export * as array from './array.js';
export * as assert from './assert.js';
export * as json from './json.js';
export * as math from './math.js';
export * as normal from './stats/normal.js';

export * from './util.js';
export * from './assignDeep.js';
