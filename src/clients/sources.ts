import { readFileSync } from 'node:fs';
import { QueryError } from '../errors.js';
import { parseAttrValues } from '../attrs/registry.js';
import type { AttrValues } from '../attrs/registry.js';
import {
  Detector,
  Instrument,
  Level,
  Resolution,
  SatelliteNumber,
  Time,
  Wavelength,
} from '../attrs/standard.js';
import type { Branch } from '../query/types.js';
import { checkAttrTypes } from './branches.js';

/**
 * What a known archive accepts. Pass `canHandle` and `attrValues` to a
 * client config to route branches to that archive.
 */
export interface SourceDescriptor {
  readonly name: string;
  canHandle(branch: Branch): boolean;
  attrValues(): AttrValues;
}

const CATALOGUE_URL = new URL('../../data/sources.json', import.meta.url);

let catalogue: Record<string, unknown> | undefined;

function sourceValues(name: string): AttrValues {
  if (catalogue === undefined) {
    const parsed: unknown = JSON.parse(readFileSync(CATALOGUE_URL, 'utf8'));
    if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
      throw new QueryError(`${CATALOGUE_URL.pathname} must contain an object keyed by source name`);
    }
    catalogue = Object.fromEntries(Object.entries(parsed));
  }
  return parseAttrValues(catalogue[name] ?? {}, `${name} attr values`);
}

function instruments(branch: Branch): string[] {
  return branch.children.filter(Instrument.is).map((leaf) => leaf.value.toLowerCase());
}

/** Level 0CS (or anything equal to 0) is the only level EVE quicklook serves. */
function isLevelZero(value: string | number): boolean {
  if (typeof value === 'number') return value === 0;
  const text = value.trim().toLowerCase();
  if (text === '0cs') return true;
  return /^[+-]?\d+$/.test(text) && Number(text) === 0;
}

export const EVE: SourceDescriptor = {
  name: 'EVE',
  canHandle(branch) {
    if (!checkAttrTypes(branch, [Time, Instrument, Level])) return false;
    const levels = branch.children.filter(Level.is);
    return instruments(branch).every((name) => name === 'eve')
      && levels.every((leaf) => isLevelZero(leaf.value));
  },
  attrValues: () => sourceValues('EVE'),
};

export const XRS: SourceDescriptor = {
  name: 'XRS',
  canHandle(branch) {
    if (!checkAttrTypes(branch, [Instrument], [Time, SatelliteNumber])) return false;
    return instruments(branch).some((name) => name === 'xrs' || name === 'goes');
  },
  attrValues: () => sourceValues('XRS'),
};

export const GBM: SourceDescriptor = {
  name: 'GBM',
  canHandle(branch) {
    if (!checkAttrTypes(branch, [Instrument], [Time, Detector, Resolution])) return false;
    return instruments(branch).some((name) => name === 'gbm');
  },
  attrValues: () => sourceValues('GBM'),
};

/** GOES-R Solar Ultraviolet Imager. A branch must name the instrument exactly once. */
export const SUVI: SourceDescriptor = {
  name: 'SUVI',
  canHandle(branch) {
    if (!checkAttrTypes(branch, [Time, Instrument], [Wavelength, Level, SatelliteNumber])) return false;
    const names = instruments(branch);
    return names.length === 1 && names[0] === 'suvi';
  },
  attrValues: () => sourceValues('SUVI'),
};
