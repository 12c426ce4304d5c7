/**
 * @file constants.ts
 * @description Scene-wide defaults and closed sets of names recognised by the interpreters.
 *
 * @external-interactions
 * - `DEFAULT_*` entity names seed a fresh `SceneBuilder` before any options directive.
 * - `COLOR_SPACES` is the set accepted by the `ColorSpace` directive.
 *
 * @pitfalls
 * - `FORMAT_INDENT` must stay in sync with the width the formatter uses for parameter lists,
 *   otherwise nested blocks and their parameters drift apart.
 */

export const COLOR_SPACES = ['srgb', 'dci-p3', 'rec2020', 'aces2065-1'] as const;
export type ColorSpaceName = typeof COLOR_SPACES[number];
export const DEFAULT_COLOR_SPACE: ColorSpaceName = 'srgb';

export const DEFAULT_MATERIAL = 'diffuse';
export const DEFAULT_FILM = 'rgb';
export const DEFAULT_FILTER = 'gaussian';

export const ATTRIBUTE_TARGETS = ['shape', 'light', 'material', 'medium', 'texture'] as const;
export type AttributeTarget = typeof ATTRIBUTE_TARGETS[number];

export const TEXTURE_TYPES = ['float', 'spectrum'] as const;
export type TextureType = typeof TEXTURE_TYPES[number];

// Spaces per nesting level in formatted output.
export const FORMAT_INDENT = 4;

export function isColorSpaceName(name: string): name is ColorSpaceName {
  const names: readonly string[] = COLOR_SPACES;
  return names.includes(name);
}

export function isAttributeTarget(name: string): name is AttributeTarget {
  const targets: readonly string[] = ATTRIBUTE_TARGETS;
  return targets.includes(name);
}

export function isTextureType(name: string): name is TextureType {
  const types: readonly string[] = TEXTURE_TYPES;
  return types.includes(name);
}
