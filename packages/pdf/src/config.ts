import { debug } from 'util';
import { lilconfig } from 'lilconfig';
import { assignDeep, isFiniteNumber, isObject, Status } from '@kernelpdf/base';
import * as defaults from './defaults.js';
import * as selection from './selection.js';
import type { Options as DictionaryOptions } from './dictionary.js';

const dbg = debug('kernelpdf:config');

export interface KernelPdfConfig {
  /** Kernel truncation, in standard deviations, for new dictionaries */
  sigmaTrunc: number;

  /**
   * Relative amplitude threshold used to ignore observations with negligible
   * weights. Takes precedence over `cdfThresh`; null disables it.
   */
  wtThresh: number | null;

  /**
   * Threshold on the weight-sorted cumulative mass, used only when
   * `wtThresh` is null. When both are null every observation is kept.
   */
  cdfThresh: number | null;

  /** Evaluation window, in standard deviations, of the direct estimator */
  sigThresh: number;
}

export const DEFAULT_CONFIG: Readonly<KernelPdfConfig> = Object.freeze({
  sigmaTrunc: defaults.DICTIONARY.sigmaTrunc,
  wtThresh: defaults.SELECTION.wtThresh,
  cdfThresh: defaults.SELECTION.cdfThresh,
  sigThresh: defaults.DIRECT.sigThresh,
});

const explorer = lilconfig('kernelpdf');

/** Map of rootDir to config */
const sessionConfigs = new Map<string, KernelPdfConfig>();

const isPositive = (x: unknown): x is number => isFiniteNumber(x) && x > 0;

const isThreshold = (x: unknown): x is number | null => x === null || (isFiniteNumber(x) && x >= 0);

/**
 * Validates a (partial) configuration object and fills in the defaults.
 */
export function parse(raw: unknown): Status<KernelPdfConfig> {
  if (raw !== undefined && raw !== null && !isObject(raw)) {
    return Status.err(`Expected the kernelpdf configuration to be an object, got ${typeof raw}`);
  }

  const merged = assignDeep({}, DEFAULT_CONFIG, raw);
  const { sigmaTrunc, wtThresh, cdfThresh, sigThresh } = merged;

  if (!isPositive(sigmaTrunc)) {
    return Status.err(`Invalid 'sigmaTrunc' (${sigmaTrunc}), expected a positive number`);
  }

  if (!isPositive(sigThresh)) {
    return Status.err(`Invalid 'sigThresh' (${sigThresh}), expected a positive number`);
  }

  if (!isThreshold(wtThresh)) {
    return Status.err(`Invalid 'wtThresh' (${wtThresh}), expected a non-negative number or null`);
  }

  if (!isThreshold(cdfThresh)) {
    return Status.err(`Invalid 'cdfThresh' (${cdfThresh}), expected a non-negative number or null`);
  }

  return Status.value({ sigmaTrunc, wtThresh, cdfThresh, sigThresh });
}

/**
 * Finds the kernelpdf configuration for the given directory (a `kernelpdf`
 * key in package.json, a `.kernelpdfrc.json`, `kernelpdf.config.js`, ...)
 * and merges it over the defaults. Results are cached per directory.
 */
export async function load(rootDir: string): Promise<Status<KernelPdfConfig>> {
  const cached = sessionConfigs.get(rootDir);
  if (cached !== undefined) return Status.value(cached);

  let found: unknown;
  try {
    const sr = await explorer.search(rootDir);

    if (sr !== null && !sr.isEmpty) {
      dbg('Loading (%s)', sr.filepath);
      found = sr.config;
    } else {
      dbg('Config file not found, using defaults');
    }
  } catch (e) {
    dbg('Failed to load config file %s', e);
    return Status.err(e instanceof Error ? e : String(e));
  }

  const cfg = parse(found);
  if (!Status.isErr(cfg)) {
    dbg('%o', cfg[0]);
    sessionConfigs.set(rootDir, cfg[0]);
  }

  return cfg;
}

/** The observation selection policy of a configuration */
export function selectionPolicy(cfg: KernelPdfConfig): selection.SelectionPolicy {
  return selection.fromThresholds(cfg);
}

export function dictionaryOptions(cfg: KernelPdfConfig): DictionaryOptions {
  return { sigmaTrunc: cfg.sigmaTrunc };
}
