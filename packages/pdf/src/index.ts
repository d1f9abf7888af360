export * as config from './config.js';
export * as defaults from './defaults.js';
export * as gaussian from './gaussian.js';
export * as photometry from './photometry.js';
export * as selection from './selection.js';

export { KernelDictionary } from './dictionary.js';
export type { DictionaryJson, Options as DictionaryOptions, Quantized } from './dictionary.js';
export { stack, accumulate } from './stack.js';
export type { StackInput, StackOptions } from './stack.js';
export { kde } from './direct.js';
export type { KdeOptions } from './direct.js';
export { loglike } from './loglike.js';
export type { LogLikeOptions, LogLikeResult } from './loglike.js';
export type { SelectionPolicy } from './selection.js';
export type { KernelPdfConfig } from './config.js';

export * from './errors.js';
