import type { StatValue } from '@core/types';

type Converter = (value: string) => StatValue | undefined;

const INTEGER = /^[+-]?\d+$/;
const OCTAL = /^[0-7]+$/;

const asString: Converter = (value) => value;
const asInteger: Converter = (value) => (INTEGER.test(value) ? Number(value) : undefined);
const asFloat: Converter = (value) => {
  const parsed = Number(value);
  return value.trim().length === 0 || Number.isNaN(parsed) ? undefined : parsed;
};
const asFlag: Converter = (value) => (INTEGER.test(value) ? Number(value) !== 0 : undefined);
// rusage is reported as seconds:microseconds
const asRusage: Converter = (value) => asFloat(value.replace(':', '.'));

/** Stats that are not plain integers. */
const STAT_CONVERTERS: Readonly<Record<string, Converter>> = {
  version: asString,
  rusage_user: asRusage,
  rusage_system: asRusage,
  hash_is_expanding: asFlag,
  slab_reassign_running: asFlag,
  inter: asString,
  evictions: (value) => value === 'on',
  growth_factor: asFloat,
  stat_key_prefix: asString,
  umask: (value) => (OCTAL.test(value) ? parseInt(value, 8) : undefined),
  detail_enabled: asFlag,
  cas_enabled: asFlag,
  auth_enabled_sasl: (value) => value === 'yes',
  maxconns_fast: asFlag,
  slab_reassign: asFlag,
  slab_automove: asFlag,
};

/** Convert raw `STAT` pairs; values that fail conversion are left out. */
export const convertStats = (stats: ReadonlyArray<readonly [string, string]>): Record<string, StatValue> => {
  const result: Record<string, StatValue> = {};
  for (const [name, raw] of stats) {
    const convert = Object.hasOwn(STAT_CONVERTERS, name) ? STAT_CONVERTERS[name] : asInteger;
    const value = convert(raw);
    if (value !== undefined) {
      result[name] = value;
    }
  }
  return result;
};
