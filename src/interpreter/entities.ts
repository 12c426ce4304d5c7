/**
 * @file entities.ts
 * @description Records produced by `SceneBuilder` and handed to the render driver at `WorldEnd`.
 *
 * @pitfalls
 * - Entities reference each other only by index (materials, area lights) or by name
 *   (named materials, media, textures, instance definitions); never by object reference.
 * - Transform fields hold `TransformCache` handles: compare them with `===`, not `equals`.
 * - All transforms are render-from-X: render space is world space translated so the camera sits at the origin.
 */
import type { FileLoc } from '../ir/file-loc';
import type { ParameterDictionary } from '../ir/parameter-dictionary';
import type { AnimatedTransform } from '../geometry/animated-transform';
import type { Transform } from '../geometry/transform';
import type { TransformCacheStats } from '../geometry/transform-cache';
import type { MaterialRef } from '../state/graphics-state';
import type { RenderOptions } from '../state/render-options';

export interface SceneEntity {
  name: string;
  parameters: ParameterDictionary;
  loc: FileLoc;
}

export interface TransformedSceneEntity extends SceneEntity {
  renderFromObject: AnimatedTransform;
}

export interface TextureEntity extends TransformedSceneEntity {
  // Name the scene refers to the texture by; `name` is the implementation (e.g. "imagemap").
  textureName: string;
}

export interface LightEntity extends TransformedSceneEntity {
  medium: string;
}

export interface CameraEntity extends SceneEntity {
  renderFromCamera: AnimatedTransform;
  worldFromCamera: AnimatedTransform;
  medium: string;
}

interface ShapeCommon extends SceneEntity {
  reverseOrientation: boolean;
  material: MaterialRef;
  // Index into `SceneGraph.areaLights`.
  areaLightIndex?: number;
  insideMedium: string;
  outsideMedium: string;
}

export interface ShapeEntity extends ShapeCommon {
  renderFromObject: Transform;
  objectFromRender: Transform;
}

export interface AnimatedShapeEntity extends ShapeCommon {
  renderFromObject: AnimatedTransform;
  identity: Transform;
}

export interface InstanceDefinition {
  name: string;
  loc: FileLoc;
  shapes: ShapeEntity[];
  animatedShapes: AnimatedShapeEntity[];
}

export type InstanceStamp =
  | { kind: 'static'; name: string; loc: FileLoc; renderFromInstance: Transform }
  | { kind: 'animated'; name: string; loc: FileLoc; renderFromInstance: AnimatedTransform };

export interface SceneGraph {
  options: RenderOptions;
  camera?: CameraEntity;
  film: SceneEntity;
  sampler?: SceneEntity;
  filter: SceneEntity;
  integrator?: SceneEntity;
  accelerator?: SceneEntity;

  materials: SceneEntity[];
  namedMaterials: Map<string, SceneEntity>;
  media: Map<string, TransformedSceneEntity>;
  floatTextures: TextureEntity[];
  spectrumTextures: TextureEntity[];
  lights: LightEntity[];
  areaLights: SceneEntity[];
  shapes: ShapeEntity[];
  animatedShapes: AnimatedShapeEntity[];
  instanceDefinitions: Map<string, InstanceDefinition>;
  instances: InstanceStamp[];
  haveScatteringMedia: boolean;
}

export interface SceneStatistics {
  transformCache: TransformCacheStats;
  instancesCreated: number;
  instancesUsed: number;
}

/** Consumer of the finished graph. Called once, at `WorldEnd`. */
export interface RenderDriver {
  render(scene: SceneGraph): void;
  reportStatistics?(stats: SceneStatistics): void;
}
