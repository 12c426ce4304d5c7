/**
 * @file scene-builder.ts
 * @description Interprets scene directives into a render-ready entity graph.
 *
 * @external-interactions
 * - Driven by the parser (or `dispatchDirective`) through the `SceneInterpreter` methods.
 * - `worldEnd`: Hands the finished `SceneGraph` to the `RenderDriver`, then reports statistics.
 *
 * @pitfalls
 * - Directives used in the wrong block are logged and ignored; they never touch state.
 * - Fatal conditions throw. The builder is not meant to be reused after a throw.
 * - After `worldEnd` the builder is back in `Uninitialized`: every further directive is rejected.
 * - Transforms in the graph are relative to render space (world translated by the camera position).
 */
import { DEFAULT_FILM, DEFAULT_FILTER, DEFAULT_MATERIAL, isAttributeTarget, isColorSpaceName, isTextureType } from '../constants';
import type { FileLoc } from '../ir/file-loc';
import { UNKNOWN_LOC, formatLoc } from '../ir/file-loc';
import { ParameterDictionary } from '../ir/parameter-dictionary';
import { cloneParameter, makeParameter } from '../ir/parameters';
import { AnimatedTransform } from '../geometry/animated-transform';
import { Transform } from '../geometry/transform';
import { TransformCache } from '../geometry/transform-cache';
import { ActiveTransformBits, TransformSet } from '../geometry/transform-set';
import {
  GraphicsStateStack,
  createGraphicsState,
  withActiveTransformBits,
  withAreaLight,
  withAttributes,
  withColorSpace,
  withMaterialIndex,
  withMediumInterface,
  withNamedMaterial,
  withReversedOrientation,
  withTransforms,
} from '../state/graphics-state';
import type { GraphicsState } from '../state/graphics-state';
import { applyOption, createRenderOptions } from '../state/render-options';
import type { RenderOptions } from '../state/render-options';
import { BEGIN_DIRECTIVE, NestingStack } from '../utils/nesting-stack';
import { consoleLogHandler, fatal } from './diagnostics';
import type { LogHandler } from './diagnostics';
import type {
  AnimatedShapeEntity,
  InstanceDefinition,
  RenderDriver,
  SceneEntity,
  SceneGraph,
  SceneStatistics,
  ShapeEntity,
  TextureEntity,
} from './entities';
import type { ParameterList, SceneInterpreter } from './scene-interpreter';

export enum APIState {
  Uninitialized = 'uninitialized',
  OptionsBlock = 'options',
  WorldBlock = 'world',
}

export interface SceneBuilderInit {
  driver?: RenderDriver;
  options?: RenderOptions;
  logHandler?: LogHandler;
  transformCache?: TransformCache;
}

interface PushedTransforms {
  ctm: TransformSet;
  activeTransformBits: ActiveTransformBits;
}

export class SceneBuilder implements SceneInterpreter {
  private state = APIState.OptionsBlock;
  private gs: GraphicsState = createGraphicsState();
  private readonly stateStack = new GraphicsStateStack();
  private readonly pushedTransforms: PushedTransforms[] = [];
  private readonly nesting = new NestingStack();
  private readonly namedCoordinateSystems = new Map<string, TransformSet>();
  private readonly transformCache: TransformCache;
  private readonly driver?: RenderDriver;
  private readonly logHandler: LogHandler;

  // Render space is world space translated so that the camera is at the origin.
  private renderFromWorld = new TransformSet();
  private transformStartTime = 0;
  private transformEndTime = 1;

  private activeInstance?: InstanceDefinition;
  private instancesCreated = 0;
  private instancesUsed = 0;

  private readonly graph: SceneGraph;

  constructor(init: SceneBuilderInit = {}) {
    this.driver = init.driver;
    this.logHandler = init.logHandler ?? consoleLogHandler('SceneBuilder');
    this.transformCache = init.transformCache ?? new TransformCache();
    this.graph = {
      options: init.options ?? createRenderOptions(),
      film: this.entity(DEFAULT_FILM, []),
      filter: this.entity(DEFAULT_FILTER, []),
      materials: [this.entity(DEFAULT_MATERIAL, [])],
      namedMaterials: new Map(),
      media: new Map(),
      floatTextures: [],
      spectrumTextures: [],
      lights: [],
      areaLights: [],
      shapes: [],
      animatedShapes: [],
      instanceDefinitions: new Map(),
      instances: [],
      haveScatteringMedia: false,
    };
  }

  get scene(): SceneGraph {
    return this.graph;
  }

  get apiState(): APIState {
    return this.state;
  }

  get graphicsState(): GraphicsState {
    return this.gs;
  }

  get options(): RenderOptions {
    return this.graph.options;
  }

  get statistics(): SceneStatistics {
    return {
      transformCache: this.transformCache.stats,
      instancesCreated: this.instancesCreated,
      instancesUsed: this.instancesUsed,
    };
  }

  namedCoordinateSystem(name: string): TransformSet | undefined {
    return this.namedCoordinateSystems.get(name);
  }

  // -------------------------------------------------------
  // API state checks
  // -------------------------------------------------------

  private verifyInitialized(directive: string, loc: FileLoc): boolean {
    if (this.state === APIState.Uninitialized) {
      this.logHandler('error', `Scene description must be inside options or world block; "${directive}" not allowed. Ignoring.`, loc);
      return false;
    }
    return true;
  }

  private verifyOptions(directive: string, loc: FileLoc): boolean {
    if (!this.verifyInitialized(directive, loc)) return false;
    if (this.state === APIState.WorldBlock) {
      this.logHandler('error', `Options cannot be set inside world block; "${directive}" not allowed. Ignoring.`, loc);
      return false;
    }
    return true;
  }

  private verifyWorld(directive: string, loc: FileLoc): boolean {
    if (!this.verifyInitialized(directive, loc)) return false;
    if (this.state === APIState.OptionsBlock) {
      this.logHandler('error', `Scene description must be inside world block; "${directive}" not allowed. Ignoring.`, loc);
      return false;
    }
    return true;
  }

  // -------------------------------------------------------
  // Helpers
  // -------------------------------------------------------

  private entity(name: string, params: ParameterList, loc: FileLoc = UNKNOWN_LOC, attributes: ParameterList = []): SceneEntity {
    return { name, parameters: new ParameterDictionary(params, this.gs.colorSpace, attributes), loc };
  }

  private updateActive(fn: (t: Transform) => Transform) {
    this.gs = withTransforms(this.gs, this.gs.ctm.update(this.gs.activeTransformBits, fn));
  }

  /** Current transforms relative to render space. */
  private renderFromObject(): TransformSet {
    return this.gs.ctm.map((t, slot) => this.renderFromWorld.get(slot).compose(t));
  }

  private animated(set: TransformSet): AnimatedTransform {
    return new AnimatedTransform(
      this.transformCache.lookup(set.start),
      this.transformStartTime,
      this.transformCache.lookup(set.end),
      this.transformEndTime
    );
  }

  private restoreGraphicsState(loc: FileLoc) {
    const saved = this.stateStack.restore();
    if (!saved) throw fatal(loc, 'Graphics state stack is empty');
    this.gs = saved;
  }

  private closeInstance(instance: InstanceDefinition) {
    this.graph.instanceDefinitions.set(instance.name, instance);
    this.activeInstance = undefined;
    this.instancesCreated++;
  }

  // -------------------------------------------------------
  // Options and transforms
  // -------------------------------------------------------

  option(name: string, value: string, loc: FileLoc) {
    if (!this.verifyInitialized('Option', loc)) return;
    const result = applyOption(this.graph.options, name, value);
    if (!result.success) throw fatal(loc, result.message);
    this.graph.options = result.options;
  }

  identity(loc: FileLoc) {
    if (!this.verifyInitialized('Identity', loc)) return;
    this.updateActive(() => Transform.identity());
  }

  translate(dx: number, dy: number, dz: number, loc: FileLoc) {
    if (!this.verifyInitialized('Translate', loc)) return;
    const t = Transform.translate(dx, dy, dz);
    this.updateActive(ctm => ctm.compose(t));
  }

  scale(sx: number, sy: number, sz: number, loc: FileLoc) {
    if (!this.verifyInitialized('Scale', loc)) return;
    const t = Transform.scale(sx, sy, sz);
    this.updateActive(ctm => ctm.compose(t));
  }

  rotate(angle: number, ax: number, ay: number, az: number, loc: FileLoc) {
    if (!this.verifyInitialized('Rotate', loc)) return;
    const t = Transform.rotate(angle, ax, ay, az);
    this.updateActive(ctm => ctm.compose(t));
  }

  lookAt(
    ex: number, ey: number, ez: number,
    lx: number, ly: number, lz: number,
    ux: number, uy: number, uz: number,
    loc: FileLoc
  ) {
    if (!this.verifyInitialized('LookAt', loc)) return;
    const t = Transform.lookAt([ex, ey, ez], [lx, ly, lz], [ux, uy, uz]);
    if (!t) {
      this.logHandler('error', '"up" vector and viewing direction passed to LookAt are pointing in the same direction. Ignoring.', loc);
      return;
    }
    this.updateActive(ctm => ctm.compose(t));
  }

  concatTransform(values: readonly number[], loc: FileLoc) {
    if (!this.verifyInitialized('ConcatTransform', loc)) return;
    if (values.length !== 16) throw fatal(loc, `ConcatTransform requires 16 values, got ${values.length}`);
    const t = Transform.fromColumnMajor(values);
    this.updateActive(ctm => ctm.compose(t));
  }

  transform(values: readonly number[], loc: FileLoc) {
    if (!this.verifyInitialized('Transform', loc)) return;
    if (values.length !== 16) throw fatal(loc, `Transform requires 16 values, got ${values.length}`);
    const t = Transform.fromColumnMajor(values);
    this.updateActive(() => t);
  }

  coordinateSystem(name: string, loc: FileLoc) {
    if (!this.verifyInitialized('CoordinateSystem', loc)) return;
    this.namedCoordinateSystems.set(name, this.gs.ctm);
  }

  coordSysTransform(name: string, loc: FileLoc) {
    if (!this.verifyInitialized('CoordSysTransform', loc)) return;
    const saved = this.namedCoordinateSystems.get(name);
    if (!saved) {
      this.logHandler('warning', `Couldn't find named coordinate system "${name}"`, loc);
      return;
    }
    this.gs = withTransforms(this.gs, saved);
  }

  activeTransformAll(loc: FileLoc) {
    if (!this.verifyInitialized('ActiveTransformAll', loc)) return;
    this.gs = withActiveTransformBits(this.gs, ActiveTransformBits.All);
  }

  activeTransformEndTime(loc: FileLoc) {
    if (!this.verifyInitialized('ActiveTransformEndTime', loc)) return;
    this.gs = withActiveTransformBits(this.gs, ActiveTransformBits.End);
  }

  activeTransformStartTime(loc: FileLoc) {
    if (!this.verifyInitialized('ActiveTransformStartTime', loc)) return;
    this.gs = withActiveTransformBits(this.gs, ActiveTransformBits.Start);
  }

  transformTimes(start: number, end: number, loc: FileLoc) {
    if (!this.verifyOptions('TransformTimes', loc)) return;
    this.transformStartTime = start;
    this.transformEndTime = end;
  }

  colorSpace(name: string, loc: FileLoc) {
    if (!this.verifyInitialized('ColorSpace', loc)) return;
    if (!isColorSpaceName(name)) {
      this.logHandler('error', `${name}: color space unknown`, loc);
      return;
    }
    this.gs = withColorSpace(this.gs, name);
  }

  // -------------------------------------------------------
  // Options block
  // -------------------------------------------------------

  camera(name: string, params: ParameterList, loc: FileLoc) {
    if (!this.verifyOptions('Camera', loc)) return;

    const cameraFromWorld = this.gs.ctm;
    const worldFromCamera = cameraFromWorld.inverse();
    this.renderFromWorld = worldFromCamera.map(t => {
      const [x, y, z] = t.applyToPoint([0, 0, 0]);
      return Transform.translate(-x, -y, -z);
    });
    this.namedCoordinateSystems.set('camera', worldFromCamera);

    const renderFromCamera = cameraFromWorld.map((t, slot) => t.compose(this.renderFromWorld.get(slot).inverse()).inverse());
    this.graph.camera = {
      ...this.entity(name, params, loc),
      renderFromCamera: this.animated(renderFromCamera),
      worldFromCamera: this.animated(worldFromCamera),
      medium: this.gs.outsideMedium,
    };
  }

  film(type: string, params: ParameterList, loc: FileLoc) {
    if (!this.verifyOptions('Film', loc)) return;
    this.graph.film = this.entity(type, params, loc);
  }

  sampler(name: string, params: ParameterList, loc: FileLoc) {
    if (!this.verifyOptions('Sampler', loc)) return;
    this.graph.sampler = this.entity(name, params, loc);
  }

  pixelFilter(name: string, params: ParameterList, loc: FileLoc) {
    if (!this.verifyOptions('PixelFilter', loc)) return;
    this.graph.filter = this.entity(name, params, loc);
  }

  integrator(name: string, params: ParameterList, loc: FileLoc) {
    if (!this.verifyOptions('Integrator', loc)) return;
    this.graph.integrator = this.entity(name, params, loc);
  }

  accelerator(name: string, params: ParameterList, loc: FileLoc) {
    if (!this.verifyOptions('Accelerator', loc)) return;
    this.graph.accelerator = this.entity(name, params, loc);
  }

  // -------------------------------------------------------
  // World block: scopes
  // -------------------------------------------------------

  worldBegin(loc: FileLoc) {
    if (!this.verifyOptions('WorldBegin', loc)) return;
    this.state = APIState.WorldBlock;
    this.gs = withActiveTransformBits(withTransforms(this.gs, new TransformSet()), ActiveTransformBits.All);
    this.namedCoordinateSystems.set('world', this.gs.ctm);
  }

  attributeBegin(loc: FileLoc) {
    if (!this.verifyWorld('AttributeBegin', loc)) return;
    this.stateStack.save(this.gs);
    this.nesting.push('attribute', loc);
  }

  attributeEnd(loc: FileLoc) {
    if (!this.verifyWorld('AttributeEnd', loc)) return;
    this.nesting.popOrThrow('attribute', loc);
    this.restoreGraphicsState(loc);
  }

  transformBegin(loc: FileLoc) {
    if (!this.verifyWorld('TransformBegin', loc)) return;
    this.pushedTransforms.push({ ctm: this.gs.ctm, activeTransformBits: this.gs.activeTransformBits });
    this.nesting.push('transform', loc);
  }

  transformEnd(loc: FileLoc) {
    if (!this.verifyWorld('TransformEnd', loc)) return;
    this.nesting.popOrThrow('transform', loc);
    const saved = this.pushedTransforms.pop();
    if (!saved) throw fatal(loc, 'Transform stack is empty');
    this.gs = withActiveTransformBits(withTransforms(this.gs, saved.ctm), saved.activeTransformBits);
  }

  attribute(target: string, params: ParameterList, loc: FileLoc) {
    if (!this.verifyInitialized('Attribute', loc)) return;
    if (!isAttributeTarget(target)) {
      throw fatal(loc, `Unknown attribute target "${target}". Must be "shape", "light", "material", "medium", or "texture".`);
    }
    const colorSpace = this.gs.colorSpace;
    const overrides = params.map(p => ({ ...cloneParameter(p), mayBeUnused: true, colorSpace }));
    this.gs = withAttributes(this.gs, target, overrides);
  }

  // -------------------------------------------------------
  // World block: entities
  // -------------------------------------------------------

  texture(name: string, type: string, texName: string, params: ParameterList, loc: FileLoc) {
    if (!this.verifyWorld('Texture', loc)) return;
    if (!isTextureType(type)) {
      throw fatal(loc, `${type}: texture type unknown. Must be "float" or "spectrum".`);
    }
    const textures = type === 'float' ? this.graph.floatTextures : this.graph.spectrumTextures;
    if (textures.some(t => t.textureName === name)) {
      throw fatal(loc, `Redefining texture "${name}".`);
    }
    const texture: TextureEntity = {
      ...this.entity(texName, params, loc, this.gs.attributes.texture),
      textureName: name,
      renderFromObject: this.animated(this.renderFromObject()),
    };
    textures.push(texture);
  }

  material(name: string, params: ParameterList, loc: FileLoc) {
    if (!this.verifyWorld('Material', loc)) return;
    this.graph.materials.push(this.entity(name, params, loc, this.gs.attributes.material));
    this.gs = withMaterialIndex(this.gs, this.graph.materials.length - 1);
  }

  makeNamedMaterial(name: string, params: ParameterList, loc: FileLoc) {
    if (!this.verifyWorld('MakeNamedMaterial', loc)) return;
    if (this.graph.namedMaterials.has(name)) {
      throw fatal(loc, `MakeNamedMaterial: ${name}: named material redefined.`);
    }
    this.graph.namedMaterials.set(name, this.entity(name, params, loc, this.gs.attributes.material));
  }

  namedMaterial(name: string, loc: FileLoc) {
    if (!this.verifyWorld('NamedMaterial', loc)) return;
    this.gs = withNamedMaterial(this.gs, name);
  }

  makeNamedMedium(name: string, params: ParameterList, loc: FileLoc) {
    if (!this.verifyInitialized('MakeNamedMedium', loc)) return;
    if (this.graph.media.has(name)) {
      throw fatal(loc, `MakeNamedMedium: named medium "${name}" redefined.`);
    }
    if (this.gs.ctm.isAnimated()) {
      this.logHandler('warning', 'Animated transformations set; ignoring for "MakeNamedMedium" and using the start transform only', loc);
    }
    this.graph.media.set(name, {
      ...this.entity(name, params, loc, this.gs.attributes.medium),
      renderFromObject: this.animated(this.renderFromObject()),
    });
  }

  mediumInterface(insideName: string, outsideName: string, loc: FileLoc) {
    if (!this.verifyInitialized('MediumInterface', loc)) return;
    this.gs = withMediumInterface(this.gs, insideName, outsideName);
    this.graph.haveScatteringMedia = true;
  }

  lightSource(name: string, params: ParameterList, loc: FileLoc) {
    if (!this.verifyWorld('LightSource', loc)) return;
    this.graph.lights.push({
      ...this.entity(name, params, loc, this.gs.attributes.light),
      renderFromObject: this.animated(this.renderFromObject()),
      medium: this.gs.outsideMedium,
    });
  }

  areaLightSource(name: string, params: ParameterList, loc: FileLoc) {
    if (!this.verifyWorld('AreaLightSource', loc)) return;
    this.gs = withAreaLight(this.gs, {
      name,
      params: params.map(cloneParameter),
      lightAttributes: [...this.gs.attributes.light],
      colorSpace: this.gs.colorSpace,
      loc: { ...loc },
    });
  }

  shape(name: string, params: ParameterList, loc: FileLoc) {
    if (!this.verifyWorld('Shape', loc)) return;

    let areaLightIndex: number | undefined;
    const areaLight = this.gs.areaLight;
    if (areaLight) {
      if (this.activeInstance) {
        this.logHandler('warning', 'Area lights not supported with object instancing', loc);
      } else {
        this.graph.areaLights.push({
          name: areaLight.name,
          parameters: new ParameterDictionary(areaLight.params, areaLight.colorSpace, areaLight.lightAttributes),
          loc: areaLight.loc,
        });
        areaLightIndex = this.graph.areaLights.length - 1;
      }
    }

    const common = {
      ...this.entity(name, params, loc, this.gs.attributes.shape),
      reverseOrientation: this.gs.reverseOrientation,
      material: this.gs.material,
      areaLightIndex,
      insideMedium: this.gs.insideMedium,
      outsideMedium: this.gs.outsideMedium,
    };

    // Static vs animated follows the current transform alone; a moving camera does not count.
    const renderFromObject = this.renderFromObject();
    if (this.gs.ctm.isAnimated()) {
      const shape: AnimatedShapeEntity = {
        ...common,
        renderFromObject: this.animated(renderFromObject),
        identity: this.transformCache.lookup(Transform.identity()),
      };
      (this.activeInstance?.animatedShapes ?? this.graph.animatedShapes).push(shape);
    } else {
      const forward = this.transformCache.lookup(renderFromObject.start);
      const shape: ShapeEntity = {
        ...common,
        renderFromObject: forward,
        objectFromRender: this.transformCache.lookup(forward.inverse()),
      };
      (this.activeInstance?.shapes ?? this.graph.shapes).push(shape);
    }
  }

  reverseOrientation(loc: FileLoc) {
    if (!this.verifyWorld('ReverseOrientation', loc)) return;
    this.gs = withReversedOrientation(this.gs);
  }

  // -------------------------------------------------------
  // Instancing
  // -------------------------------------------------------

  objectBegin(name: string, loc: FileLoc) {
    if (!this.verifyWorld('ObjectBegin', loc)) return;
    if (this.activeInstance) {
      throw fatal(loc, `ObjectBegin called inside of instance definition "${this.activeInstance.name}"`);
    }
    if (this.graph.instanceDefinitions.has(name)) {
      throw fatal(loc, `ObjectBegin: ${name}: trying to redefine an object instance`);
    }

    this.stateStack.save(this.gs);
    this.nesting.push('object', loc);

    const nameAttribute = { ...makeParameter('string', 'name', [name], { ...loc }), mayBeUnused: true, colorSpace: this.gs.colorSpace };
    this.gs = withAttributes(this.gs, 'shape', [nameAttribute]);
    this.activeInstance = { name, loc, shapes: [], animatedShapes: [] };
  }

  objectEnd(loc: FileLoc) {
    if (!this.verifyWorld('ObjectEnd', loc)) return;
    const instance = this.activeInstance;
    if (!instance) throw fatal(loc, 'ObjectEnd called outside of instance definition');
    this.nesting.popOrThrow('object', loc);
    this.restoreGraphicsState(loc);
    this.closeInstance(instance);
  }

  objectInstance(name: string, loc: FileLoc) {
    if (!this.verifyWorld('ObjectInstance', loc)) return;
    if (this.activeInstance) {
      throw fatal(loc, `ObjectInstance can't be called inside instance definition "${this.activeInstance.name}"`);
    }
    if (!this.graph.instanceDefinitions.has(name)) {
      throw fatal(loc, `ObjectInstance: ${name}: object instance not defined`);
    }
    this.instancesUsed++;

    const worldFromRender = this.renderFromWorld.inverse();
    const renderFromInstance = this.renderFromObject().map((t, slot) => t.compose(worldFromRender.get(slot)));
    if (this.gs.ctm.isAnimated()) {
      this.graph.instances.push({ kind: 'animated', name, loc, renderFromInstance: this.animated(renderFromInstance) });
    } else {
      this.graph.instances.push({ kind: 'static', name, loc, renderFromInstance: this.transformCache.lookup(renderFromInstance.start) });
    }
  }

  // -------------------------------------------------------
  // End of world
  // -------------------------------------------------------

  worldEnd(loc: FileLoc) {
    if (!this.verifyWorld('WorldEnd', loc)) return;

    for (const open of this.nesting.drain()) {
      this.logHandler('warning', `Missing end to ${BEGIN_DIRECTIVE[open.kind]} from ${formatLoc(open.loc)}`, loc);
      if (open.kind === 'transform') {
        const saved = this.pushedTransforms.pop();
        if (saved) this.gs = withActiveTransformBits(withTransforms(this.gs, saved.ctm), saved.activeTransformBits);
      } else {
        this.restoreGraphicsState(loc);
      }
    }
    if (this.activeInstance) this.closeInstance(this.activeInstance);

    this.driver?.render(this.graph);
    if (!this.graph.options.quiet) this.driver?.reportStatistics?.(this.statistics);
    this.state = APIState.Uninitialized;
  }
}
