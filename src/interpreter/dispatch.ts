/**
 * @file dispatch.ts
 * @description Replays tokenizer output (`DirectiveCall`s) onto any `SceneInterpreter`.
 *
 * @external-interactions
 * - The parser hands over `{ name, args, loc }` records; `dispatchDirective` validates the
 *   positional `args` against the directive's zod schema and calls the matching method.
 *
 * @pitfalls
 * - Directive names are the scene-file keywords (`PixelFilter`, `ActiveTransform`, ...), not the method names.
 * - A malformed call throws before the interpreter sees it, so interpreter state is untouched.
 */
import { z } from 'zod';
import {
  ParameterListSchema,
  formatValidationErrors,
  toValidationErrors,
  validateDirectiveCall,
} from '../ir/directive-schema';
import type { DirectiveCallInput } from '../ir/directive-schema';
import type { FileLoc } from '../ir/file-loc';
import { formatLoc } from '../ir/file-loc';
import type { SceneInterpreter } from './scene-interpreter';

type DirectiveHandler = (target: SceneInterpreter, args: unknown[], loc: FileLoc) => void;

const num = z.number();
const str = z.string();
const params = ParameterListSchema;
const matrix = z.array(num).length(16);

function handler<T extends z.ZodTypeAny>(
  name: string,
  schema: T,
  apply: (target: SceneInterpreter, args: z.output<T>, loc: FileLoc) => void
): DirectiveHandler {
  return (target, args, loc) => {
    const parsed = schema.safeParse(args);
    if (!parsed.success) {
      throw new Error(`${formatLoc(loc)}: ${name}: invalid arguments: ${formatValidationErrors(toValidationErrors(parsed.error))}`);
    }
    apply(target, parsed.data, loc);
  };
}

const none = z.tuple([]);
const nameAndParams = z.tuple([str, params]);

const HANDLERS: Record<string, DirectiveHandler> = {
  Option: handler('Option', z.tuple([str, str]), (t, [name, value], loc) => t.option(name, value, loc)),
  Identity: handler('Identity', none, (t, _, loc) => t.identity(loc)),
  Translate: handler('Translate', z.tuple([num, num, num]), (t, [dx, dy, dz], loc) => t.translate(dx, dy, dz, loc)),
  Scale: handler('Scale', z.tuple([num, num, num]), (t, [sx, sy, sz], loc) => t.scale(sx, sy, sz, loc)),
  Rotate: handler('Rotate', z.tuple([num, num, num, num]), (t, [angle, ax, ay, az], loc) => t.rotate(angle, ax, ay, az, loc)),
  LookAt: handler(
    'LookAt',
    z.tuple([num, num, num, num, num, num, num, num, num]),
    (t, [ex, ey, ez, lx, ly, lz, ux, uy, uz], loc) => t.lookAt(ex, ey, ez, lx, ly, lz, ux, uy, uz, loc)
  ),
  ConcatTransform: handler('ConcatTransform', z.tuple([matrix]), (t, [m], loc) => t.concatTransform(m, loc)),
  Transform: handler('Transform', z.tuple([matrix]), (t, [m], loc) => t.transform(m, loc)),
  CoordinateSystem: handler('CoordinateSystem', z.tuple([str]), (t, [name], loc) => t.coordinateSystem(name, loc)),
  CoordSysTransform: handler('CoordSysTransform', z.tuple([str]), (t, [name], loc) => t.coordSysTransform(name, loc)),
  ActiveTransform: handler('ActiveTransform', z.tuple([z.enum(['All', 'StartTime', 'EndTime'])]), (t, [which], loc) => {
    if (which === 'All') t.activeTransformAll(loc);
    else if (which === 'StartTime') t.activeTransformStartTime(loc);
    else t.activeTransformEndTime(loc);
  }),
  TransformTimes: handler('TransformTimes', z.tuple([num, num]), (t, [start, end], loc) => t.transformTimes(start, end, loc)),
  ColorSpace: handler('ColorSpace', z.tuple([str]), (t, [name], loc) => t.colorSpace(name, loc)),

  Camera: handler('Camera', nameAndParams, (t, [name, p], loc) => t.camera(name, p, loc)),
  Film: handler('Film', nameAndParams, (t, [type, p], loc) => t.film(type, p, loc)),
  Sampler: handler('Sampler', nameAndParams, (t, [name, p], loc) => t.sampler(name, p, loc)),
  PixelFilter: handler('PixelFilter', nameAndParams, (t, [name, p], loc) => t.pixelFilter(name, p, loc)),
  Integrator: handler('Integrator', nameAndParams, (t, [name, p], loc) => t.integrator(name, p, loc)),
  Accelerator: handler('Accelerator', nameAndParams, (t, [name, p], loc) => t.accelerator(name, p, loc)),

  WorldBegin: handler('WorldBegin', none, (t, _, loc) => t.worldBegin(loc)),
  WorldEnd: handler('WorldEnd', none, (t, _, loc) => t.worldEnd(loc)),
  AttributeBegin: handler('AttributeBegin', none, (t, _, loc) => t.attributeBegin(loc)),
  AttributeEnd: handler('AttributeEnd', none, (t, _, loc) => t.attributeEnd(loc)),
  TransformBegin: handler('TransformBegin', none, (t, _, loc) => t.transformBegin(loc)),
  TransformEnd: handler('TransformEnd', none, (t, _, loc) => t.transformEnd(loc)),
  Attribute: handler('Attribute', nameAndParams, (t, [target, p], loc) => t.attribute(target, p, loc)),

  Texture: handler('Texture', z.tuple([str, str, str, params]), (t, [name, type, texName, p], loc) => t.texture(name, type, texName, p, loc)),
  Material: handler('Material', nameAndParams, (t, [name, p], loc) => t.material(name, p, loc)),
  MakeNamedMaterial: handler('MakeNamedMaterial', nameAndParams, (t, [name, p], loc) => t.makeNamedMaterial(name, p, loc)),
  NamedMaterial: handler('NamedMaterial', z.tuple([str]), (t, [name], loc) => t.namedMaterial(name, loc)),
  MakeNamedMedium: handler('MakeNamedMedium', nameAndParams, (t, [name, p], loc) => t.makeNamedMedium(name, p, loc)),
  // A single medium name applies to both sides.
  MediumInterface: handler('MediumInterface', z.array(str).min(1).max(2), (t, names, loc) =>
    t.mediumInterface(names[0], names[1] ?? names[0], loc)
  ),
  LightSource: handler('LightSource', nameAndParams, (t, [name, p], loc) => t.lightSource(name, p, loc)),
  AreaLightSource: handler('AreaLightSource', nameAndParams, (t, [name, p], loc) => t.areaLightSource(name, p, loc)),
  Shape: handler('Shape', nameAndParams, (t, [name, p], loc) => t.shape(name, p, loc)),
  ReverseOrientation: handler('ReverseOrientation', none, (t, _, loc) => t.reverseOrientation(loc)),

  ObjectBegin: handler('ObjectBegin', z.tuple([str]), (t, [name], loc) => t.objectBegin(name, loc)),
  ObjectEnd: handler('ObjectEnd', none, (t, _, loc) => t.objectEnd(loc)),
  ObjectInstance: handler('ObjectInstance', z.tuple([str]), (t, [name], loc) => t.objectInstance(name, loc)),
};

export const DIRECTIVE_NAMES: readonly string[] = Object.keys(HANDLERS);

export function dispatchDirective(target: SceneInterpreter, call: unknown) {
  const validated = validateDirectiveCall(call);
  if (!validated.success) {
    throw new Error(`Malformed directive call: ${formatValidationErrors(validated.errors)}`);
  }
  const { name, args, loc } = validated.data;
  if (!Object.hasOwn(HANDLERS, name)) throw new Error(`${formatLoc(loc)}: unknown directive "${name}"`);
  HANDLERS[name](target, args, loc);
}

export function dispatchAll(target: SceneInterpreter, calls: Iterable<DirectiveCallInput>) {
  for (const call of calls) dispatchDirective(target, call);
}
