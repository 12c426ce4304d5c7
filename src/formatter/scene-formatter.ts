/**
 * @file scene-formatter.ts
 * @description Re-emits scene directives as canonical, indented scene-file text,
 * optionally upgrading legacy forms on the way (see `upgrade.ts`).
 *
 * @external-interactions
 * - Implements `SceneInterpreter`, so any directive stream that drives `SceneBuilder` can drive this.
 * - Text goes to `write`; without one it accumulates and is read back through `output`.
 *
 * @pitfalls
 * - Indentation is the nesting depth, so `ObjectBegin` indents its body just like `AttributeBegin`.
 * - Mismatched Begin/End pairs throw, exactly as they do in the builder.
 * - Numbers are printed in their shortest round-trip form (`1`, not `1.000000`).
 */
import { DEFAULT_COLOR_SPACE, FORMAT_INDENT } from '../constants';
import type { FileLoc } from '../ir/file-loc';
import { ParameterDictionary } from '../ir/parameter-dictionary';
import { formatNumber, formatParameter } from '../ir/parameters';
import { consoleLogHandler } from '../interpreter/diagnostics';
import type { LogHandler } from '../interpreter/diagnostics';
import type { ParameterList, SceneInterpreter } from '../interpreter/scene-interpreter';
import { BEGIN_DIRECTIVE, NestingStack } from '../utils/nesting-stack';
import {
  rewriteScaleTextureParams,
  upgradeAreaLight,
  upgradeCamera,
  upgradeFilmType,
  upgradeIntegrator,
  upgradeLight,
  upgradeMaterial,
  upgradePixelFilter,
  upgradeSamplerName,
  upgradeShape,
  upgradeTexture,
  upgradeTextureType,
} from './upgrade';
import type { UpgradeContext } from './upgrade';

export interface SceneFormatterOptions {
  upgrade?: boolean;
  write?: (chunk: string) => void;
  logHandler?: LogHandler;
}

export class SceneFormatter implements SceneInterpreter {
  readonly upgrade: boolean;
  private readonly nesting = new NestingStack();
  private readonly logHandler: LogHandler;
  private readonly write: (chunk: string) => void;
  private chunks: string[] = [];

  constructor(options: SceneFormatterOptions = {}) {
    this.upgrade = options.upgrade ?? false;
    this.logHandler = options.logHandler ?? consoleLogHandler('SceneFormatter');
    this.write = options.write ?? (chunk => this.chunks.push(chunk));
  }

  /** Everything written so far, when no `write` sink was given. */
  get output(): string {
    return this.chunks.join('');
  }

  private indent(extra = 0): string {
    return this.nesting.indent(extra);
  }

  private line(text: string) {
    this.write(`${this.indent()}${text}\n`);
  }

  private numbers(values: readonly number[]): string {
    return values.map(formatNumber).join(' ');
  }

  private dictionary(params: ParameterList): ParameterDictionary {
    return new ParameterDictionary(params, DEFAULT_COLOR_SPACE);
  }

  private context(loc: FileLoc): UpgradeContext {
    return { loc, log: this.logHandler };
  }

  /** Directive header, then the upgrade's extra definitions, then what is left of the parameters. */
  private emit(header: string, extra: readonly string[], dict: ParameterDictionary) {
    const pad = this.indent(1);
    this.line(header);
    if (extra.length > 0) this.write(extra.map(def => `${pad}${def}\n`).join(''));
    if (dict.size > 0) this.write(dict.toParameterList(this.nesting.depth * FORMAT_INDENT));
  }

  // -------------------------------------------------------
  // Options and transforms
  // -------------------------------------------------------

  option(name: string, value: string, _loc: FileLoc) {
    this.line(`Option "${name}" ${value}`);
  }

  identity(_loc: FileLoc) {
    this.line('Identity');
  }

  translate(dx: number, dy: number, dz: number, _loc: FileLoc) {
    this.line(`Translate ${this.numbers([dx, dy, dz])}`);
  }

  scale(sx: number, sy: number, sz: number, _loc: FileLoc) {
    this.line(`Scale ${this.numbers([sx, sy, sz])}`);
  }

  rotate(angle: number, ax: number, ay: number, az: number, _loc: FileLoc) {
    this.line(`Rotate ${this.numbers([angle, ax, ay, az])}`);
  }

  lookAt(
    ex: number, ey: number, ez: number,
    lx: number, ly: number, lz: number,
    ux: number, uy: number, uz: number,
    _loc: FileLoc
  ) {
    this.line(`LookAt ${this.numbers([ex, ey, ez])}`);
    this.line(`    ${this.numbers([lx, ly, lz])}`);
    this.line(`    ${this.numbers([ux, uy, uz])}`);
  }

  concatTransform(values: readonly number[], _loc: FileLoc) {
    this.line(`ConcatTransform [ ${this.numbers(values)} ]`);
  }

  transform(values: readonly number[], _loc: FileLoc) {
    this.line(`Transform [ ${this.numbers(values)} ]`);
  }

  coordinateSystem(name: string, _loc: FileLoc) {
    this.line(`CoordinateSystem "${name}"`);
  }

  coordSysTransform(name: string, _loc: FileLoc) {
    this.line(`CoordSysTransform "${name}"`);
  }

  activeTransformAll(_loc: FileLoc) {
    this.line('ActiveTransform All');
  }

  activeTransformEndTime(_loc: FileLoc) {
    this.line('ActiveTransform EndTime');
  }

  activeTransformStartTime(_loc: FileLoc) {
    this.line('ActiveTransform StartTime');
  }

  transformTimes(start: number, end: number, _loc: FileLoc) {
    this.line(`TransformTimes ${this.numbers([start, end])}`);
  }

  colorSpace(name: string, _loc: FileLoc) {
    this.line(`ColorSpace "${name}"`);
  }

  // -------------------------------------------------------
  // Options block
  // -------------------------------------------------------

  camera(name: string, params: ParameterList, _loc: FileLoc) {
    const dict = this.dictionary(params);
    const { name: newName, extra } = this.upgrade ? upgradeCamera(name, dict) : { name, extra: [] };
    this.emit(`Camera "${newName}"`, extra, dict);
  }

  film(type: string, params: ParameterList, _loc: FileLoc) {
    const newType = this.upgrade ? upgradeFilmType(type) : type;
    this.emit(`Film "${newType}"`, [], this.dictionary(params));
  }

  sampler(name: string, params: ParameterList, _loc: FileLoc) {
    const newName = this.upgrade ? upgradeSamplerName(name) : name;
    this.emit(`Sampler "${newName}"`, [], this.dictionary(params));
  }

  pixelFilter(name: string, params: ParameterList, _loc: FileLoc) {
    const dict = this.dictionary(params);
    const extra = this.upgrade ? upgradePixelFilter(name, dict) : [];
    this.emit(`PixelFilter "${name}"`, extra, dict);
  }

  integrator(name: string, params: ParameterList, _loc: FileLoc) {
    const dict = this.dictionary(params);
    const { name: newName, extra } = this.upgrade ? upgradeIntegrator(name, dict) : { name, extra: [] };
    this.emit(`Integrator "${newName}"`, extra, dict);
  }

  accelerator(name: string, params: ParameterList, _loc: FileLoc) {
    this.emit(`Accelerator "${name}"`, [], this.dictionary(params));
  }

  // -------------------------------------------------------
  // Scopes
  // -------------------------------------------------------

  worldBegin(_loc: FileLoc) {
    this.write('\n\nWorldBegin\n\n');
  }

  worldEnd(_loc: FileLoc) {
    this.line('WorldEnd');
    for (const open of this.nesting.drain()) {
      this.logHandler('warning', `Missing end to ${BEGIN_DIRECTIVE[open.kind]}`, open.loc);
    }
  }

  attributeBegin(loc: FileLoc) {
    this.write(`\n${this.indent()}AttributeBegin\n`);
    this.nesting.push('attribute', loc);
  }

  attributeEnd(loc: FileLoc) {
    this.nesting.popOrThrow('attribute', loc);
    this.line('AttributeEnd');
  }

  transformBegin(loc: FileLoc) {
    this.line('TransformBegin');
    this.nesting.push('transform', loc);
  }

  transformEnd(loc: FileLoc) {
    this.nesting.popOrThrow('transform', loc);
    this.line('TransformEnd');
  }

  attribute(target: string, params: ParameterList, _loc: FileLoc) {
    if (params.length === 1) {
      this.line(`Attribute "${target}" ${formatParameter(params[0])}`);
      return;
    }
    this.emit(`Attribute "${target}"`, [], this.dictionary(params));
  }

  // -------------------------------------------------------
  // Entities
  // -------------------------------------------------------

  texture(name: string, type: string, texName: string, params: ParameterList, _loc: FileLoc) {
    const rewritten = this.upgrade && texName === 'scale' ? rewriteScaleTextureParams(name, type, params) : params;
    const dict = this.dictionary(rewritten);
    const extra = this.upgrade ? upgradeTexture(texName, dict) : [];
    const newType = this.upgrade ? upgradeTextureType(type) : type;
    this.emit(`Texture "${name}" "${newType}" "${texName}"`, extra, dict);
  }

  material(name: string, params: ParameterList, loc: FileLoc) {
    const dict = this.dictionary(params);
    const { name: newName, extra } = this.upgrade ? upgradeMaterial(name, dict, this.context(loc)) : { name, extra: [] };
    this.emit(`Material "${newName}"`, extra, dict);
  }

  makeNamedMaterial(name: string, params: ParameterList, loc: FileLoc) {
    const dict = this.dictionary(params);
    if (!this.upgrade) {
      this.emit(`MakeNamedMaterial "${name}"`, [], dict);
      return;
    }
    const upgraded = upgradeMaterial(dict.getOneString('type', ''), dict, this.context(loc));
    dict.removeString('type');
    const typeDefinition = `"string type" [ "${upgraded.name}" ]`;
    this.emit(`MakeNamedMaterial "${name}"`, [typeDefinition, ...upgraded.extra], dict);
  }

  namedMaterial(name: string, _loc: FileLoc) {
    this.line(`NamedMaterial "${name}"`);
  }

  makeNamedMedium(name: string, params: ParameterList, _loc: FileLoc) {
    this.emit(`MakeNamedMedium "${name}"`, [], this.dictionary(params));
  }

  mediumInterface(insideName: string, outsideName: string, _loc: FileLoc) {
    this.line(`MediumInterface "${insideName}" "${outsideName}"`);
  }

  lightSource(name: string, params: ParameterList, loc: FileLoc) {
    const dict = this.dictionary(params);
    const extra = this.upgrade ? upgradeLight(name, dict, this.context(loc)) : [];
    this.emit(`LightSource "${name}"`, extra, dict);
  }

  areaLightSource(name: string, params: ParameterList, loc: FileLoc) {
    const dict = this.dictionary(params);
    const { name: newName, extra } = this.upgrade ? upgradeAreaLight(name, dict, this.context(loc)) : { name, extra: [] };
    this.emit(`AreaLightSource "${newName}"`, extra, dict);
  }

  shape(name: string, params: ParameterList, _loc: FileLoc) {
    const dict = this.dictionary(params);
    const extra = this.upgrade ? upgradeShape(name, dict) : [];
    this.emit(`Shape "${name}"`, extra, dict);
  }

  reverseOrientation(_loc: FileLoc) {
    this.line('ReverseOrientation');
  }

  // -------------------------------------------------------
  // Instancing
  // -------------------------------------------------------

  objectBegin(name: string, loc: FileLoc) {
    this.line(`ObjectBegin "${name}"`);
    this.nesting.push('object', loc);
  }

  objectEnd(loc: FileLoc) {
    this.nesting.popOrThrow('object', loc);
    this.line('ObjectEnd');
  }

  objectInstance(name: string, _loc: FileLoc) {
    this.line(`ObjectInstance "${name}"`);
  }
}
