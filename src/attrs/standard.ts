import { QueryError } from '../errors.js';
import { defineAttr, defineAttrKind } from './define.js';

export interface TimeRange {
  /** ISO 8601, UTC. */
  readonly start: string;
  readonly end: string;
}

export interface WavelengthRange {
  /** Angstrom. */
  readonly min: number;
  readonly max: number;
}

export type SimpleValue = string | number;

/** Attrs whose payload is a single string or number. */
export const Simple = defineAttrKind<SimpleValue>('Simple');

/** Attrs whose payload is a numeric interval. */
export const Range = defineAttrKind<WavelengthRange>('Range');

const ANGSTROMS_PER_UNIT = {
  angstrom: 1,
  nm: 10,
  um: 1e4,
} as const;

export type WavelengthUnit = keyof typeof ANGSTROMS_PER_UNIT;

function toDate(value: string | Date, label: string): Date {
  const date = value instanceof Date ? new Date(value.getTime()) : new Date(value);
  if (Number.isNaN(date.getTime())) {
    throw new QueryError(`Time: ${label} "${String(value)}" is not a valid date`);
  }
  return date;
}

function simpleValue<T extends SimpleValue>(attr: string, value: T): T {
  if (typeof value === 'string' && value.trim() === '') {
    throw new QueryError(`${attr}: value must be a non-empty string`);
  }
  if (typeof value === 'number' && !Number.isFinite(value)) {
    throw new QueryError(`${attr}: value must be a finite number`);
  }
  return value;
}

/** Closed time interval. A single argument means one instant. */
export const Time = defineAttr('Time', {
  create: (start: string | Date, end?: string | Date): TimeRange => {
    const startDate = toDate(start, 'start');
    const endDate = end === undefined ? startDate : toDate(end, 'end');
    const startIso = startDate.toISOString();
    const endIso = endDate.toISOString();
    // Expanded years (+010000) do not sort as strings
    if (endDate.getTime() < startDate.getTime()) {
      throw new QueryError(`Time: end ${endIso} is before start ${startIso}`);
    }
    return Object.freeze({ start: startIso, end: endIso });
  },
});

/**
 * Wavelength interval, stored in angstrom. Bounds given in reverse order
 * are swapped.
 */
export const Wavelength = defineAttr('Wavelength', {
  parents: [Range],
  create: (min: number, max: number = min, unit: WavelengthUnit = 'angstrom'): WavelengthRange => {
    if (!Number.isFinite(min) || !Number.isFinite(max) || min <= 0 || max <= 0) {
      throw new QueryError(`Wavelength: bounds must be positive numbers, got ${min} and ${max}`);
    }
    const factor = ANGSTROMS_PER_UNIT[unit];
    const lo = Math.min(min, max) * factor;
    const hi = Math.max(min, max) * factor;
    return Object.freeze({ min: lo, max: hi });
  },
});

export const Instrument = defineAttr('Instrument', {
  parents: [Simple],
  create: (name: string) => simpleValue('Instrument', name),
});

export const Level = defineAttr('Level', {
  parents: [Simple],
  create: (level: SimpleValue) => simpleValue('Level', level),
});

export const Source = defineAttr('Source', {
  parents: [Simple],
  create: (name: string) => simpleValue('Source', name),
});

export const Provider = defineAttr('Provider', {
  parents: [Simple],
  create: (name: string) => simpleValue('Provider', name),
});

export const Physobs = defineAttr('Physobs', {
  parents: [Simple],
  create: (name: string) => simpleValue('Physobs', name),
});

export const Detector = defineAttr('Detector', {
  parents: [Simple],
  create: (name: string) => simpleValue('Detector', name),
});

export const Resolution = defineAttr('Resolution', {
  parents: [Simple],
  create: (name: string) => simpleValue('Resolution', name),
});

export const SatelliteNumber = defineAttr('SatelliteNumber', {
  parents: [Simple],
  create: (number: number) => {
    if (!Number.isInteger(number) || number <= 0) {
      throw new QueryError(`SatelliteNumber: expected a positive integer, got ${number}`);
    }
    return number;
  },
});

/**
 * Flat string map. Converters rewrite typed attrs into ValueAttrs so that a
 * single applier can copy them into a request.
 */
export const ValueAttr = defineAttr('ValueAttr', {
  create: (entries: Readonly<Record<string, string>>): Readonly<Record<string, string>> =>
    Object.freeze({ ...entries }),
});
