//
// Error codes, status, results
//

export type Status<T = unknown> = [null, Error] | [T];

export namespace Status {
  /** Create an error */
  export function err<T = never>(msg: string | Error): Status<T> {
    return typeof msg === 'string'
        ? [null, new Error(msg)]
        : [null, msg];
  }

  /** Check the given status is an error */
  export function isErr<T>(s: Status<T>): s is [null, Error] {
    return s.length === 2;
  }

  export function value<T>(val: T): Status<T> {
    return [val];
  }

  /** Get the status value or throw an exception */
  export function get<T>(s: Status<T>): T {
    if (isErr(s)) { throw s[1]; }
    return s[0];
  }
}

//
// Helpers
//

export function isObject(item: unknown): item is Record<string, unknown> {
  return typeof item === 'object' && item !== null && !Array.isArray(item);
}

export function isFiniteNumber(x: unknown): x is number {
  return typeof x === 'number' && Number.isFinite(x);
}
