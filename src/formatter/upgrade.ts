/**
 * @file upgrade.ts
 * @description Rewrites legacy directive forms into the current scene format.
 * Used by `SceneFormatter` when constructed with `upgrade: true`.
 *
 * @external-interactions
 * - Each function edits the given `ParameterDictionary` in place (removals and renames) and
 *   returns the parameter definitions that replace what was removed, as scene-file text.
 *
 * @pitfalls
 * - Rewrites that would lose information throw; lossy but safe rewrites only warn.
 * - `rewriteScaleTextureParams` works on the raw parameter list because it changes a
 *   parameter's type, which the dictionary cannot do.
 */
import type { FileLoc } from '../ir/file-loc';
import type { ParameterDictionary } from '../ir/parameter-dictionary';
import { canonicalType, formatParameter, makeParameter } from '../ir/parameters';
import type { ParameterValue, ParsedParameter } from '../ir/parameters';
import { fatal } from '../interpreter/diagnostics';
import type { LogLevel } from '../interpreter/diagnostics';

export interface UpgradeContext {
  loc: FileLoc;
  log: (level: LogLevel, message: string, loc?: FileLoc) => void;
}

export interface UpgradeResult {
  name: string;
  // Parameter definitions to print before the remaining parameters.
  extra: string[];
}

function definition(type: string, name: string, values: readonly ParameterValue[]): string {
  return formatParameter(makeParameter(type, name, values));
}

// ------------------------------------------------------------------
// Options block
// ------------------------------------------------------------------

export function upgradePixelFilter(name: string, dict: ParameterDictionary): string[] {
  const extra: string[] = [];
  const xr = dict.getFloatArray('xwidth');
  if (xr.length === 1) {
    dict.removeFloat('xwidth');
    extra.push(definition('float', 'xradius', xr));
  }
  const yr = dict.getFloatArray('ywidth');
  if (yr.length === 1) {
    dict.removeFloat('ywidth');
    extra.push(definition('float', 'yradius', yr));
  }
  if (name === 'gaussian') {
    const alpha = dict.getFloatArray('alpha');
    if (alpha.length === 1) {
      dict.removeFloat('alpha');
      extra.push(definition('float', 'sigma', [1 / Math.sqrt(2 * alpha[0])]));
    }
  }
  return extra;
}

export function upgradeFilmType(type: string): string {
  return type === 'image' ? 'rgb' : type;
}

export function upgradeSamplerName(name: string): string {
  if (name === 'lowdiscrepancy' || name === '02sequence') return 'paddedsobol';
  if (name === 'maxmindist') return 'pmj02bn';
  return name;
}

export function upgradeIntegrator(name: string, dict: ParameterDictionary): UpgradeResult {
  const extra: string[] = [];
  if (name === 'sppm') {
    dict.removeInt('imagewritefrequency');
    const iterations = dict.getIntArray('numiterations');
    if (iterations.length > 0) {
      dict.removeInt('numiterations');
      extra.push(definition('integer', 'iterations', [iterations[0]]));
    }
  }
  if (dict.getOneString('lightsamplestrategy', '') === 'spatial') {
    dict.removeString('lightsamplestrategy');
    extra.push(definition('string', 'lightsamplestrategy', ['bvh']));
  }
  if (name === 'directlighting') {
    extra.push(definition('integer', 'maxdepth', [1]));
    return { name: 'path', extra };
  }
  return { name, extra };
}

export function upgradeCamera(name: string, dict: ParameterDictionary): UpgradeResult {
  if (name === 'environment') {
    return { name: 'spherical', extra: [definition('string', 'mapping', ['equirect'])] };
  }
  if (name === 'realistic') dict.removeBool('simpleweighting');
  return { name, extra: [] };
}

// ------------------------------------------------------------------
// Textures
// ------------------------------------------------------------------

/**
 * Legacy `scale` textures multiply `tex1` by `tex2`. The current form is
 * `tex` times a float `scale`, so for spectrum textures one operand must be
 * a constant RGB that collapses to that float.
 */
export function rewriteScaleTextureParams(textureName: string, type: string, params: readonly ParsedParameter[]): ParsedParameter[] {
  if (type === 'float') {
    return params.map(p => {
      if (p.name === 'tex1') return { ...p, name: 'tex' };
      if (p.name === 'tex2') return { ...p, name: 'scale' };
      return p;
    });
  }

  let foundRGB = false;
  let foundTexture = false;
  return params.map(p => {
    if (p.name !== 'tex1' && p.name !== 'tex2') return p;

    if (canonicalType(p.type) === 'rgb') {
      if (foundRGB) {
        throw fatal(p.loc, `Two "rgb" textures found for "scale" texture "${textureName}". Please manually edit the file to upgrade.`);
      }
      if (p.numbers.length !== 3) {
        throw fatal(p.loc, `Didn't find 3 values for "rgb" "${p.name}".`);
      }
      if (p.numbers[0] !== p.numbers[1] || p.numbers[1] !== p.numbers[2]) {
        throw fatal(p.loc, `Non-constant "rgb" value found for "scale" texture parameter "${p.name}". Please manually edit the file to upgrade.`);
      }
      foundRGB = true;
      return { ...p, type: 'float', name: 'scale', numbers: [p.numbers[0]] };
    }

    if (foundTexture) {
      throw fatal(p.loc, `Two textures found for "scale" texture "${textureName}". Please manually edit the file to upgrade.`);
    }
    foundTexture = true;
    return { ...p, name: 'tex' };
  });
}

export function upgradeTextureType(type: string): string {
  return type === 'color' ? 'spectrum' : type;
}

export function upgradeTexture(texName: string, dict: ParameterDictionary): string[] {
  const extra: string[] = [];
  if (texName === 'imagemap') {
    const trilinear = dict.getBoolArray('trilinear');
    if (trilinear.length === 1) {
      dict.removeBool('trilinear');
      extra.push(definition('string', 'filter', [trilinear[0] ? 'trilinear' : 'bilinear']));
    }
  }

  if (texName === 'imagemap' || texName === 'ptex') {
    const filename = dict.getOneString('filename', '');
    if (filename) {
      dict.removeString('filename');
      extra.push(definition('string', 'imagefile', [filename]));
    }

    const gamma = dict.getOneFloat('gamma', 0);
    if (gamma !== 0) {
      dict.removeFloat('gamma');
      extra.push(definition('string', 'encoding', [`gamma ${gamma}`]));
    } else {
      const gammaFlag = dict.getBoolArray('gamma');
      if (gammaFlag.length === 1) {
        dict.removeBool('gamma');
        extra.push(definition('string', 'encoding', [gammaFlag[0] ? 'sRGB' : 'linear']));
      }
    }
  }
  return extra;
}

// ------------------------------------------------------------------
// Materials
// ------------------------------------------------------------------

function upgradeMaterialIndex(name: string, dict: ParameterDictionary, ctx: UpgradeContext): string[] {
  if (name !== 'glass' && name !== 'uber') return [];

  const texture = dict.getTexture('index');
  if (texture) {
    if (dict.getTexture('eta')) {
      throw fatal(ctx.loc, `Material "${name}" has both "index" and "eta" parameters.`);
    }
    dict.removeTexture('index');
    return [definition('texture', 'eta', [texture])];
  }

  const index = dict.getFloatArray('index');
  if (index.length === 0) return [];
  if (index.length !== 1) throw fatal(ctx.loc, 'Multiple values provided for "index" parameter.');
  if (dict.getFloatArray('eta').length > 0) {
    throw fatal(ctx.loc, `Material "${name}" has both "index" and "eta" parameters.`);
  }
  dict.removeFloat('index');
  return [definition('float', 'eta', index)];
}

function upgradeBumpmap(dict: ParameterDictionary): string[] {
  const bump = dict.getTexture('bumpmap');
  if (!bump) return [];
  dict.removeTexture('bumpmap');
  return [definition('texture', 'displacement', [bump])];
}

function upgradeUberOpacity(dict: ParameterDictionary, ctx: UpgradeContext) {
  if (dict.getTexture('opacity')) {
    throw fatal(ctx.loc, 'Non-opaque "opacity" in "uber" material is not supported. Please edit the file manually.');
  }
  if (!dict.hasSpectrum('opacity')) return;

  const opacity = dict.getOneRGB('opacity');
  if (opacity && opacity.r === 1 && opacity.g === 1 && opacity.b === 1) {
    dict.removeSpectrum('opacity');
    return;
  }
  throw fatal(ctx.loc, 'A non-opaque "opacity" in the "uber" material is not supported. Please edit the file manually.');
}

export function upgradeMaterial(name: string, dict: ParameterDictionary, ctx: UpgradeContext): UpgradeResult {
  const extra = [...upgradeMaterialIndex(name, dict, ctx), ...upgradeBumpmap(dict)];
  let newName = name;

  // Drops a color parameter the new material has no use for. True if it held
  // the constant `value`, i.e. nothing was lost.
  const removeIfConstant = (paramName: string, value: number): boolean => {
    const rgb = dict.getOneRGB(paramName);
    const matches = rgb !== undefined && rgb.r === value && rgb.g === value && rgb.b === value;
    if (!matches && dict.hasSpectrum(paramName)) {
      ctx.log('warning', `Parameter is being removed when converting to "${newName}" material: ${dict.toParameterDefinition(paramName)}`, ctx.loc);
    }
    dict.removeSpectrum(paramName);
    dict.removeTexture(paramName);
    return matches;
  };

  switch (name) {
    case 'uber':
      newName = 'coateddiffuse';
      if (removeIfConstant('Ks', 0)) {
        newName = 'diffuse';
        dict.removeFloat('eta');
        dict.removeFloat('roughness');
      }
      removeIfConstant('Kr', 0);
      removeIfConstant('Kt', 0);
      dict.renameParameter('Kd', 'reflectance');
      upgradeUberOpacity(dict, ctx);
      break;
    case 'mix': {
      const rgb = dict.getOneRGB('amount');
      if (rgb) {
        if (rgb.r === rgb.g && rgb.g === rgb.b) {
          extra.push(definition('float', 'amount', [rgb.r]));
        } else {
          const avg = (rgb.r + rgb.g + rgb.b) / 3;
          ctx.log('warning', `Changing RGB "amount" (${rgb.r}, ${rgb.g}, ${rgb.b}) to scalar average ${avg}`, ctx.loc);
          extra.push(definition('float', 'amount', [avg]));
        }
      } else if (dict.hasSpectrum('amount') || dict.getTexture('amount')) {
        ctx.log('error', `Unable to update non-RGB spectrum "amount" to a scalar: ${dict.toParameterDefinition('amount')}`, ctx.loc);
      }
      dict.removeSpectrum('amount');
      break;
    }
    case 'substrate':
      newName = 'coateddiffuse';
      removeIfConstant('Ks', 1);
      dict.renameParameter('Kd', 'reflectance');
      break;
    case 'glass':
      newName = 'dielectric';
      removeIfConstant('Kr', 1);
      removeIfConstant('Kt', 1);
      break;
    case 'plastic':
      newName = 'coateddiffuse';
      if (removeIfConstant('Ks', 0)) {
        newName = 'diffuse';
        dict.removeFloat('roughness');
        dict.removeFloat('eta');
      }
      dict.renameParameter('Kd', 'reflectance');
      break;
    case 'fourier':
      ctx.log('warning', '"fourier" material is no longer supported. (But there is "measured"!)', ctx.loc);
      break;
    case 'kdsubsurface':
      newName = 'subsurface';
      dict.renameParameter('Kd', 'reflectance');
      break;
    case 'matte':
      newName = 'diffuse';
      dict.renameParameter('Kd', 'reflectance');
      break;
    case 'metal':
      newName = 'conductor';
      removeIfConstant('Kr', 1);
      break;
    case 'translucent':
      newName = 'diffusetransmission';
      dict.renameParameter('Kd', 'transmittance');
      removeIfConstant('reflect', 0);
      removeIfConstant('transmit', 1);
      removeIfConstant('Ks', 0);
      dict.removeFloat('roughness');
      break;
    case 'mirror':
      newName = 'conductor';
      extra.push(
        definition('float', 'roughness', [0]),
        definition('spectrum', 'eta', ['metal-Ag-eta']),
        definition('spectrum', 'k', ['metal-Ag-k'])
      );
      removeIfConstant('Kr', 0);
      break;
  }

  return { name: newName, extra };
}

// ------------------------------------------------------------------
// Lights
// ------------------------------------------------------------------

// Folds a constant RGB parameter into `scale`. False if it is not constant.
function foldRGBIntoScale(dict: ParameterDictionary, name: string, scale: { value: number }): boolean {
  if (!dict.hasSpectrum(name)) return true;
  const rgb = dict.getOneRGB(name);
  if (!rgb || rgb.r !== rgb.g || rgb.g !== rgb.b) return false;
  scale.value *= rgb.r;
  dict.removeSpectrum(name);
  return true;
}

// Legacy blackbody emitters carry [temperature, scale]; the scale moves to "scale".
function upgradeBlackbody(dict: ParameterDictionary, scale: { value: number }): string[] {
  const extra: string[] = [];
  for (const name of ['L', 'I']) {
    const values = dict.getBlackbody(name);
    if (values.length < 2) continue;

    scale.value *= dict.getOneFloat('scale', 1) * values[1];
    dict.removeFloat('scale');
    dict.removeSpectrum(name);
    extra.push(definition('blackbody', name, [values[0]]));
  }
  return extra;
}

function upgradeMapname(dict: ParameterDictionary): string[] {
  const mapname = dict.getOneString('mapname', '');
  if (!mapname) return [];
  dict.removeString('mapname');
  return [definition('string', 'imagefile', [mapname])];
}

function scaleDefinition(dict: ParameterDictionary, scale: { value: number }): string[] {
  if (scale.value === 1) return [];
  const total = scale.value * dict.getOneFloat('scale', 1);
  dict.removeFloat('scale');
  return [definition('float', 'scale', [total])];
}

const RGB_SCALE_MESSAGE = '"scale" is now a "float" parameter to light sources. Please modify your scene file manually.';

export function upgradeLight(name: string, dict: ParameterDictionary, ctx: UpgradeContext): string[] {
  const scale = { value: 1 };
  if (!foldRGBIntoScale(dict, 'scale', scale)) {
    throw fatal(dict.loc('scale') ?? ctx.loc, RGB_SCALE_MESSAGE);
  }
  const extra = upgradeBlackbody(dict, scale);
  dict.removeInt('nsamples');

  if (dict.getOneString('mapname', '')) {
    if (name === 'infinite' && !foldRGBIntoScale(dict, 'L', scale)) {
      throw fatal(
        dict.loc('L') ?? ctx.loc,
        'Non-constant "L" is no longer supported with "mapname" for the "infinite" light source. Please upgrade your scene file manually.'
      );
    }
  } else if (name === 'projection' && !foldRGBIntoScale(dict, 'I', scale)) {
    throw fatal(
      dict.loc('I') ?? ctx.loc,
      '"I" is no longer supported with "mapname" for the "projection" light source. Please upgrade your scene file manually.'
    );
  }

  // After the infinite-light check: this removes "mapname".
  extra.push(...upgradeMapname(dict));
  extra.push(...scaleDefinition(dict, scale));
  return extra;
}

export function upgradeAreaLight(name: string, dict: ParameterDictionary, ctx: UpgradeContext): UpgradeResult {
  const scale = { value: 1 };
  if (!foldRGBIntoScale(dict, 'scale', scale)) {
    throw fatal(dict.loc('scale') ?? ctx.loc, RGB_SCALE_MESSAGE);
  }
  const extra = upgradeBlackbody(dict, scale);
  dict.removeInt('nsamples');
  extra.push(...scaleDefinition(dict, scale));
  return { name: name === 'area' ? 'diffuse' : name, extra };
}

// ------------------------------------------------------------------
// Shapes
// ------------------------------------------------------------------

function isSequence(values: readonly number[]): boolean {
  return values.every((v, i) => v === i);
}

function upgradeTriangleMeshUVs(dict: ParameterDictionary): string[] {
  let uv = dict.getPoint2Array('st');
  if (uv.length > 0) {
    dict.removePoint2('st');
  } else {
    for (const name of ['uv', 'st']) {
      const flat = dict.getFloatArray(name);
      if (flat.length === 0) continue;
      uv = [];
      for (let i = 0; i + 1 < flat.length; i += 2) uv.push([flat[i], flat[i + 1]]);
      dict.removeFloat(name);
    }
  }
  if (uv.length === 0) return [];
  return [definition('point2', 'uv', uv.flat())];
}

export function upgradeShape(name: string, dict: ParameterDictionary): string[] {
  const extra: string[] = [];

  // A lone triangle or bilinear patch does not need its trivial index list.
  const vertexCount = name === 'trianglemesh' ? 3 : name === 'bilinearmesh' ? 4 : 0;
  if (vertexCount > 0) {
    const indices = dict.getIntArray('indices');
    if (indices.length === vertexCount && dict.getPoint3Array('P').length === vertexCount && isSequence(indices)) {
      dict.removeInt('indices');
    }
  }

  if (name === 'loopsubdiv') {
    const levels = dict.getIntArray('nlevels');
    if (levels.length > 0) {
      dict.removeInt('nlevels');
      extra.push(definition('integer', 'levels', [levels[0]]));
    }
  }

  if (name === 'trianglemesh' || name === 'plymesh') dict.removeBool('discarddegenerateUVs');

  if (name === 'plymesh') {
    const filename = dict.getOneString('filename', '');
    if (filename) {
      dict.removeString('filename');
      extra.push(definition('string', 'plyfile', [filename]));
    }
  }

  if (name === 'trianglemesh') extra.push(...upgradeTriangleMeshUVs(dict));

  extra.push(...upgradeBumpmap(dict));
  dict.renameParameter('Kd', 'reflectance');
  return extra;
}
