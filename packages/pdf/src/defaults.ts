/** Kernel dictionary defaults */
export const DICTIONARY = {
  /** Number of standard deviations each kernel extends either side of its center */
  sigmaTrunc: 5,
} as const satisfies import('./dictionary.js').Options;

/** Observation selection defaults, see `selection.fromThresholds` */
export const SELECTION = {
  wtThresh: 1e-3,
  cdfThresh: 2e-4,
} as const satisfies import('./selection.js').Thresholds;

/** Direct (dictionary-free) estimation defaults */
export const DIRECT = {
  sigThresh: 5,
} as const;
