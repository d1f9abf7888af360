/** A valid Json value */
export type Value = number | string | boolean | null | { [x: string]: Value } | Array<Value>;

/** serializing an object to Json */
export interface Serializable<J extends Value = Value> {
  toJson(): J;
}

/** @returns true if x is an array of finite numbers */
export function isNumberArray(x: unknown): x is number[] {
  return Array.isArray(x) && x.every(v => typeof v === 'number' && Number.isFinite(v));
}
