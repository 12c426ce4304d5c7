/**
 * @file graphics-state.ts
 * @description The inheritable state every world directive reads: current transforms, material,
 * media, color space, orientation and per-target attribute overrides.
 *
 * @external-interactions
 * - `SceneBuilder` holds exactly one live `GraphicsState` and swaps it for a new value on every mutation.
 * - `GraphicsStateStack.save`/`restore`: Called by `AttributeBegin`/`AttributeEnd` and `ObjectBegin`/`ObjectEnd`.
 *
 * @pitfalls
 * - States are frozen by Immer. Never mutate one in place; go through the `with*` helpers,
 *   which return a new value and leave saved snapshots untouched.
 * - `TransformSet` is a class and is not drafted by Immer; assign a whole new set, never edit it.
 */
import { castDraft, produce } from 'immer';
import { DEFAULT_COLOR_SPACE } from '../constants';
import type { AttributeTarget, ColorSpaceName } from '../constants';
import type { FileLoc } from '../ir/file-loc';
import type { ParsedParameter } from '../ir/parameters';
import { ActiveTransformBits, TransformSet } from '../geometry/transform-set';

// Either an index into the material list or a key into the named-material table.
export type MaterialRef =
  | { kind: 'index'; index: number }
  | { kind: 'name'; name: string };

export interface PendingAreaLight {
  name: string;
  params: ParsedParameter[];
  // Light overrides in effect at AreaLightSource, not at the Shape that commits it.
  lightAttributes: ParsedParameter[];
  colorSpace: ColorSpaceName;
  loc: FileLoc;
}

export type AttributeOverrides = Record<AttributeTarget, ParsedParameter[]>;

export interface GraphicsState {
  ctm: TransformSet;
  activeTransformBits: ActiveTransformBits;
  insideMedium: string;
  outsideMedium: string;
  material: MaterialRef;
  areaLight?: PendingAreaLight;
  colorSpace: ColorSpaceName;
  reverseOrientation: boolean;
  attributes: AttributeOverrides;
}

export function createGraphicsState(): GraphicsState {
  return {
    ctm: new TransformSet(),
    activeTransformBits: ActiveTransformBits.All,
    insideMedium: '',
    outsideMedium: '',
    material: { kind: 'index', index: 0 },
    colorSpace: DEFAULT_COLOR_SPACE,
    reverseOrientation: false,
    attributes: { shape: [], light: [], material: [], medium: [], texture: [] },
  };
}

export function withTransforms(state: GraphicsState, ctm: TransformSet): GraphicsState {
  return produce(state, draft => {
    draft.ctm = castDraft(ctm);
  });
}

export function withActiveTransformBits(state: GraphicsState, bits: ActiveTransformBits): GraphicsState {
  return produce(state, draft => {
    draft.activeTransformBits = bits;
  });
}

export function withMaterialIndex(state: GraphicsState, index: number): GraphicsState {
  return produce(state, draft => {
    draft.material = { kind: 'index', index };
  });
}

export function withNamedMaterial(state: GraphicsState, name: string): GraphicsState {
  return produce(state, draft => {
    draft.material = { kind: 'name', name };
  });
}

export function withAreaLight(state: GraphicsState, areaLight: PendingAreaLight): GraphicsState {
  return produce(state, draft => {
    draft.areaLight = areaLight;
  });
}

export function withMediumInterface(state: GraphicsState, insideMedium: string, outsideMedium: string): GraphicsState {
  return produce(state, draft => {
    draft.insideMedium = insideMedium;
    draft.outsideMedium = outsideMedium;
  });
}

export function withColorSpace(state: GraphicsState, colorSpace: ColorSpaceName): GraphicsState {
  return produce(state, draft => {
    draft.colorSpace = colorSpace;
  });
}

export function withReversedOrientation(state: GraphicsState): GraphicsState {
  return produce(state, draft => {
    draft.reverseOrientation = !draft.reverseOrientation;
  });
}

/** Appends overrides for `target`; they apply to every later entity of that kind in scope. */
export function withAttributes(state: GraphicsState, target: AttributeTarget, params: readonly ParsedParameter[]): GraphicsState {
  return produce(state, draft => {
    draft.attributes[target].push(...params);
  });
}

/**
 * LIFO stack of saved graphics states. Snapshots are frozen, so saving is a
 * reference push and restoring hands back exactly what was saved.
 */
export class GraphicsStateStack {
  private saved: GraphicsState[] = [];

  save(state: GraphicsState) {
    this.saved.push(state);
  }

  restore(): GraphicsState | undefined {
    return this.saved.pop();
  }

  get depth(): number {
    return this.saved.length;
  }
}
