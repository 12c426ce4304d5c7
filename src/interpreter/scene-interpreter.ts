import type { FileLoc } from '../ir/file-loc';
import type { ParsedParameter } from '../ir/parameters';

export type ParameterList = readonly ParsedParameter[];

/**
 * One method per scene-file directive, called in file order by the parser.
 *
 * Implemented by `SceneBuilder` (builds the entity graph) and
 * `SceneFormatter` (re-emits the directives as text). Every method takes
 * the directive's source location last; it is used only for diagnostics.
 */
export interface SceneInterpreter {
  option(name: string, value: string, loc: FileLoc): void;

  identity(loc: FileLoc): void;
  translate(dx: number, dy: number, dz: number, loc: FileLoc): void;
  scale(sx: number, sy: number, sz: number, loc: FileLoc): void;
  rotate(angle: number, ax: number, ay: number, az: number, loc: FileLoc): void;
  lookAt(
    ex: number, ey: number, ez: number,
    lx: number, ly: number, lz: number,
    ux: number, uy: number, uz: number,
    loc: FileLoc
  ): void;
  /** `values` are 16 numbers in column-major order. */
  concatTransform(values: readonly number[], loc: FileLoc): void;
  transform(values: readonly number[], loc: FileLoc): void;
  coordinateSystem(name: string, loc: FileLoc): void;
  coordSysTransform(name: string, loc: FileLoc): void;
  activeTransformAll(loc: FileLoc): void;
  activeTransformEndTime(loc: FileLoc): void;
  activeTransformStartTime(loc: FileLoc): void;
  transformTimes(start: number, end: number, loc: FileLoc): void;

  colorSpace(name: string, loc: FileLoc): void;

  camera(name: string, params: ParameterList, loc: FileLoc): void;
  film(type: string, params: ParameterList, loc: FileLoc): void;
  sampler(name: string, params: ParameterList, loc: FileLoc): void;
  pixelFilter(name: string, params: ParameterList, loc: FileLoc): void;
  integrator(name: string, params: ParameterList, loc: FileLoc): void;
  accelerator(name: string, params: ParameterList, loc: FileLoc): void;

  worldBegin(loc: FileLoc): void;
  worldEnd(loc: FileLoc): void;
  attributeBegin(loc: FileLoc): void;
  attributeEnd(loc: FileLoc): void;
  transformBegin(loc: FileLoc): void;
  transformEnd(loc: FileLoc): void;
  attribute(target: string, params: ParameterList, loc: FileLoc): void;

  texture(name: string, type: string, texName: string, params: ParameterList, loc: FileLoc): void;
  material(name: string, params: ParameterList, loc: FileLoc): void;
  makeNamedMaterial(name: string, params: ParameterList, loc: FileLoc): void;
  namedMaterial(name: string, loc: FileLoc): void;
  makeNamedMedium(name: string, params: ParameterList, loc: FileLoc): void;
  mediumInterface(insideName: string, outsideName: string, loc: FileLoc): void;
  lightSource(name: string, params: ParameterList, loc: FileLoc): void;
  areaLightSource(name: string, params: ParameterList, loc: FileLoc): void;
  shape(name: string, params: ParameterList, loc: FileLoc): void;
  reverseOrientation(loc: FileLoc): void;

  objectBegin(name: string, loc: FileLoc): void;
  objectEnd(loc: FileLoc): void;
  objectInstance(name: string, loc: FileLoc): void;
}
