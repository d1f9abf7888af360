import { isObject } from './util.js';

const assignDeepImpl = (target: Record<string, unknown>, source: Record<string, unknown>) => {
  for (const key in source) {
    const value = source[key];
    const current = target[key];

    if (isObject(value)) {
      // nested source objects are copied, never shared with the target
      const dest = isObject(current) ? current : {};
      assignDeepImpl(dest, value);
      target[key] = dest;
    } else {
      target[key] = value;
    }
  }
};

/**
 * Recursively copies the properties of each source into target, left to right.
 * Plain objects are merged; arrays, primitives and null replace the target
 * value. Sources which are not plain objects are ignored.
 */
export const assignDeep = (target: Record<string, unknown>, ...sources: unknown[]) => {
  for (const object of sources) {
    if (isObject(object)) {
      assignDeepImpl(target, object);
    }
  }

  return target;
};
