export * from './constants';

export type { FileLoc } from './ir/file-loc';
export { UNKNOWN_LOC, formatLoc } from './ir/file-loc';
export type { ParsedParameter, ParameterValue } from './ir/parameters';
export { canonicalType, cloneParameter, formatParameter, isSpectrumType, makeParameter, parameterValues } from './ir/parameters';
export type { RGB } from './ir/parameter-dictionary';
export { ParameterDictionary } from './ir/parameter-dictionary';
export type { DirectiveCall, DirectiveCallInput, ValidationError, ValidationResult } from './ir/directive-schema';
export { DirectiveCallSchema, ParsedParameterSchema, validateDirectiveCall } from './ir/directive-schema';

export type { Point3 } from './geometry/transform';
export { Transform } from './geometry/transform';
export { AnimatedTransform } from './geometry/animated-transform';
export type { TransformCacheStats } from './geometry/transform-cache';
export { TransformCache } from './geometry/transform-cache';
export type { TransformSlot } from './geometry/transform-set';
export { ActiveTransformBits, MAX_TRANSFORMS, TransformSet } from './geometry/transform-set';

export type { RenderOptions, RenderOptionsInput } from './state/render-options';
export { RenderOptionsSchema, applyOption, createRenderOptions, normalizeOptionName } from './state/render-options';
export type { GraphicsState, MaterialRef, PendingAreaLight } from './state/graphics-state';
export { GraphicsStateStack, createGraphicsState } from './state/graphics-state';

export type { ScopeEntry, ScopeKind } from './utils/nesting-stack';
export { NestingStack } from './utils/nesting-stack';

export type { LogHandler, LogLevel } from './interpreter/diagnostics';
export { consoleLogHandler } from './interpreter/diagnostics';
export type { ParameterList, SceneInterpreter } from './interpreter/scene-interpreter';
export type * from './interpreter/entities';
export type { SceneBuilderInit } from './interpreter/scene-builder';
export { APIState, SceneBuilder } from './interpreter/scene-builder';
export { DIRECTIVE_NAMES, dispatchAll, dispatchDirective } from './interpreter/dispatch';

export type { SceneFormatterOptions } from './formatter/scene-formatter';
export { SceneFormatter } from './formatter/scene-formatter';
