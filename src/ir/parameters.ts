import type { ColorSpaceName } from '../constants';
import type { FileLoc } from './file-loc';
import { UNKNOWN_LOC } from './file-loc';

// ------------------------------------------------------------------
// Parsed Parameters
// ------------------------------------------------------------------
// One `"type name" [ values ]` entry as produced by the tokenizer. Values
// land in exactly one of the three arrays depending on their lexical kind.

export interface ParsedParameter {
  type: string;
  name: string;
  loc: FileLoc;
  numbers: number[];
  strings: string[];
  bools: boolean[];
  // Set for attribute overrides: not every shape/light/... consumes them.
  mayBeUnused: boolean;
  colorSpace?: ColorSpaceName;
}

export type ParameterValue = number | string | boolean;

// Older scene files spell some types differently.
const TYPE_ALIASES: Record<string, string> = {
  point: 'point3',
  vector: 'vector3',
  normal3: 'normal',
  color: 'rgb',
};

export function canonicalType(type: string): string {
  return TYPE_ALIASES[type] ?? type;
}

export const SPECTRUM_TYPES = ['rgb', 'blackbody', 'spectrum'];

export function isSpectrumType(type: string): boolean {
  return SPECTRUM_TYPES.includes(canonicalType(type));
}

/**
 * Builds a ParsedParameter from loose values, sorting each value into the
 * array matching its JS type.
 */
export function makeParameter(
  type: string,
  name: string,
  values: readonly ParameterValue[],
  loc: FileLoc = UNKNOWN_LOC
): ParsedParameter {
  const param: ParsedParameter = { type, name, loc, numbers: [], strings: [], bools: [], mayBeUnused: false };
  for (const v of values) {
    if (typeof v === 'number') param.numbers.push(v);
    else if (typeof v === 'string') param.strings.push(v);
    else param.bools.push(v);
  }
  return param;
}

export function parameterValues(param: ParsedParameter): ParameterValue[] {
  return [...param.numbers, ...param.strings, ...param.bools];
}

export function formatNumber(value: number): string {
  return String(value);
}

function formatValues(param: ParsedParameter): string {
  const parts = [
    ...param.numbers.map(formatNumber),
    ...param.strings.map(s => `"${s}"`),
    ...param.bools.map(b => (b ? '"true"' : '"false"')),
  ];
  return parts.join(' ');
}

export function formatParameter(param: ParsedParameter): string {
  return `"${param.type} ${param.name}" [ ${formatValues(param)} ]`;
}

/** Copy with fresh value arrays; stored copies may be frozen without touching the caller's. */
export function cloneParameter(param: ParsedParameter): ParsedParameter {
  return { ...param, loc: { ...param.loc }, numbers: [...param.numbers], strings: [...param.strings], bools: [...param.bools] };
}
