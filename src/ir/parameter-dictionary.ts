import type { ColorSpaceName } from '../constants';
import type { FileLoc } from './file-loc';
import { canonicalType, formatParameter, isSpectrumType } from './parameters';
import type { ParsedParameter } from './parameters';

export interface RGB {
  r: number;
  g: number;
  b: number;
}

/**
 * Typed name -> value lookup over a directive's parameter list.
 *
 * Explicit parameters are searched last-to-first (a later duplicate wins),
 * then attribute overrides, so explicit parameters always take precedence
 * over inherited ones. Parameters are treated as immutable: edits replace
 * entries rather than mutating them, since they may be shared with frozen
 * graphics-state snapshots.
 */
export class ParameterDictionary {
  readonly colorSpace: ColorSpaceName;
  private params: ParsedParameter[];
  private attributes: ParsedParameter[];
  private used = new Set<ParsedParameter>();

  constructor(params: readonly ParsedParameter[], colorSpace: ColorSpaceName, attributes: readonly ParsedParameter[] = []) {
    this.params = [...params];
    this.attributes = [...attributes];
    this.colorSpace = colorSpace;
  }

  get size(): number {
    return this.params.length + this.attributes.length;
  }

  // -------------------------------------------------------
  // Lookup
  // -------------------------------------------------------

  private find(type: string, name: string): ParsedParameter | undefined {
    const matches = (p: ParsedParameter) => p.name === name && canonicalType(p.type) === type;
    const found = findLast(this.params, matches) ?? findLast(this.attributes, matches);
    if (found) this.used.add(found);
    return found;
  }

  private findSpectrum(name: string): ParsedParameter | undefined {
    const matches = (p: ParsedParameter) => p.name === name && isSpectrumType(p.type);
    const found = findLast(this.params, matches) ?? findLast(this.attributes, matches);
    if (found) this.used.add(found);
    return found;
  }

  getOneFloat(name: string, def: number): number {
    return this.find('float', name)?.numbers[0] ?? def;
  }

  getOneInt(name: string, def: number): number {
    return this.find('integer', name)?.numbers[0] ?? def;
  }

  getOneBool(name: string, def: boolean): boolean {
    return this.find('bool', name)?.bools[0] ?? def;
  }

  getOneString(name: string, def: string): string {
    return this.find('string', name)?.strings[0] ?? def;
  }

  getFloatArray(name: string): number[] {
    return [...(this.find('float', name)?.numbers ?? [])];
  }

  getIntArray(name: string): number[] {
    return [...(this.find('integer', name)?.numbers ?? [])];
  }

  getBoolArray(name: string): boolean[] {
    return [...(this.find('bool', name)?.bools ?? [])];
  }

  getStringArray(name: string): string[] {
    return [...(this.find('string', name)?.strings ?? [])];
  }

  getPoint2Array(name: string): [number, number][] {
    return chunk(this.find('point2', name)?.numbers ?? [], 2).map(([x, y]): [number, number] => [x, y]);
  }

  getPoint3Array(name: string): [number, number, number][] {
    return chunk(this.find('point3', name)?.numbers ?? [], 3).map(([x, y, z]): [number, number, number] => [x, y, z]);
  }

  /** Returns the value of an `rgb` parameter, or undefined if it is absent or not an RGB triple. */
  getOneRGB(name: string): RGB | undefined {
    const p = this.find('rgb', name);
    if (!p || p.numbers.length !== 3) return undefined;
    return { r: p.numbers[0], g: p.numbers[1], b: p.numbers[2] };
  }

  /** Raw temperature (and legacy scale) values of a `blackbody` parameter. */
  getBlackbody(name: string): number[] {
    return [...(this.find('blackbody', name)?.numbers ?? [])];
  }

  /** True when `name` is bound to any spectrum-valued parameter (rgb, blackbody or spectrum). */
  hasSpectrum(name: string): boolean {
    return this.findSpectrum(name) !== undefined;
  }

  /** Name of the texture bound to `name`, or the empty string. */
  getTexture(name: string): string {
    return this.find('texture', name)?.strings[0] ?? '';
  }

  loc(name: string): FileLoc | undefined {
    const matches = (p: ParsedParameter) => p.name === name;
    return (findLast(this.params, matches) ?? findLast(this.attributes, matches))?.loc;
  }

  // -------------------------------------------------------
  // Edits
  // -------------------------------------------------------

  private remove(name: string, predicate: (type: string) => boolean) {
    const keep = (p: ParsedParameter) => !(p.name === name && predicate(canonicalType(p.type)));
    this.params = this.params.filter(keep);
    this.attributes = this.attributes.filter(keep);
  }

  removeFloat(name: string) { this.remove(name, t => t === 'float'); }
  removeInt(name: string) { this.remove(name, t => t === 'integer'); }
  removeBool(name: string) { this.remove(name, t => t === 'bool'); }
  removeString(name: string) { this.remove(name, t => t === 'string'); }
  removePoint2(name: string) { this.remove(name, t => t === 'point2'); }
  removePoint3(name: string) { this.remove(name, t => t === 'point3'); }
  removeVector3(name: string) { this.remove(name, t => t === 'vector3'); }
  removeNormal(name: string) { this.remove(name, t => t === 'normal'); }
  removeSpectrum(name: string) { this.remove(name, isSpectrumType); }
  removeTexture(name: string) { this.remove(name, t => t === 'texture'); }

  renameParameter(before: string, after: string) {
    const rename = (p: ParsedParameter) => (p.name === before ? { ...p, name: after } : p);
    this.params = this.params.map(rename);
    this.attributes = this.attributes.map(rename);
  }

  // -------------------------------------------------------
  // Usage tracking
  // -------------------------------------------------------

  /** Parameters never looked up that were not flagged as possibly unused. */
  unusedParameters(): ParsedParameter[] {
    return [...this.params, ...this.attributes].filter(p => !p.mayBeUnused && !this.used.has(p));
  }

  // -------------------------------------------------------
  // Serialization
  // -------------------------------------------------------

  toParameterDefinition(name: string): string {
    const p = findLast(this.params, q => q.name === name) ?? findLast(this.attributes, q => q.name === name);
    return p ? formatParameter(p) : '';
  }

  /**
   * One parameter per line, each indented four spaces past `indentCount`.
   */
  toParameterList(indentCount = 0): string {
    const pad = ' '.repeat(indentCount + 4);
    return [...this.params, ...this.attributes].map(p => `${pad}${formatParameter(p)}\n`).join('');
  }
}

function findLast<T>(items: readonly T[], predicate: (item: T) => boolean): T | undefined {
  for (let i = items.length - 1; i >= 0; i--) {
    if (predicate(items[i])) return items[i];
  }
  return undefined;
}

function chunk(values: readonly number[], size: number): number[][] {
  const out: number[][] = [];
  for (let i = 0; i + size <= values.length; i += size) {
    out.push(values.slice(i, i + size));
  }
  return out;
}
