let enabled = true;

export function assertionsEnabled() {
  return enabled;
}

/** Turn the runtime assertions in this module on or off */
export function setEnabled(on: boolean) {
  enabled = on;
}

function err(msg: string): never {
  throw new Error('[Failed assertion] ' + msg);
}

export function le(a: number, b: number, msg?: string): void {
  if (enabled) {
    if (a > b) err(msg ?? `Expected ${a} to be <= ${b}`);
  }
}

export function gt(a: number, b: number, msg?: string): void {
  if (enabled) {
    if (a <= b) err(msg ?? `Expected ${a} to be > ${b}`);
  }
}

export function gte(a: number, b: number, msg?: string): void {
  if (enabled) {
    if (a < b) err(msg ?? `Expected ${a} to be >= ${b}`);
  }
}

export function inRange(val: number, min: number, max: number, msg?: string): void {
  if (enabled) {
    if (val < min || val > max)
      err(msg ?? `Expected ${min} <= ${val} <= ${max}`)
  }
}

export function bounds(arr: ArrayLike<unknown>, idx: number, msg?: string) {
  if (enabled) {
    if (idx < 0 || idx >= arr.length) err(msg ?? `Expected ${idx} to be a valid element`);
  }
}
