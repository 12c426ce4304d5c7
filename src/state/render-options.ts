/**
 * @file render-options.ts
 * @description Renderer-wide options settable from the scene file via the `Option` directive.
 *
 * @external-interactions
 * - Passed to `SceneBuilder` at construction and handed to the render driver with the finished scene.
 * - `applyOption`: Called by `SceneBuilder.option` for every `Option` directive.
 *
 * @pitfalls
 * - Option names are matched after lower-casing and stripping `_`/`-`, so `disable_pixel_jitter`
 *   and `DisablePixelJitter` are the same option.
 * - The MSE paths must be given as quoted strings; the quotes are stripped here.
 */
import { z } from 'zod';

export const RenderOptionsSchema = z.object({
  disablePixelJitter: z.boolean().default(false),
  disableWavelengthJitter: z.boolean().default(false),
  forceDiffuse: z.boolean().default(false),
  recordPixelStatistics: z.boolean().default(false),
  seed: z.number().int().default(0),
  mseReferenceImage: z.string().optional(),
  mseReferenceOutput: z.string().optional(),
  quiet: z.boolean().default(false),
});

export type RenderOptions = z.infer<typeof RenderOptionsSchema>;
export type RenderOptionsInput = z.input<typeof RenderOptionsSchema>;

export function createRenderOptions(overrides: RenderOptionsInput = {}): RenderOptions {
  return RenderOptionsSchema.parse(overrides);
}

export function normalizeOptionName(name: string): string {
  return name.toLowerCase().replace(/[_-]/g, '');
}

const BooleanOptionValue = z.enum(['true', 'false']).transform(v => v === 'true');
const QuotedOptionValue = z
  .string()
  .refine(v => v.length >= 3 && v.startsWith('"') && v.endsWith('"'))
  .transform(v => v.slice(1, -1));
const IntegerOptionValue = z.string().regex(/^[+-]?\d+$/).transform(v => Number.parseInt(v, 10));

type BooleanOptionKey = 'disablePixelJitter' | 'disableWavelengthJitter' | 'forceDiffuse' | 'recordPixelStatistics';

const BOOLEAN_OPTIONS: Record<string, BooleanOptionKey> = {
  disablepixeljitter: 'disablePixelJitter',
  disablewavelengthjitter: 'disableWavelengthJitter',
  forcediffuse: 'forceDiffuse',
  pixelstats: 'recordPixelStatistics',
};

export type ApplyOptionResult =
  | { success: true; options: RenderOptions }
  | { success: false; message: string };

/**
 * Returns `options` updated by one `Option "name" value` directive. `value`
 * is the raw token text. Unknown names and malformed values fail.
 */
export function applyOption(options: RenderOptions, name: string, value: string): ApplyOptionResult {
  const key = normalizeOptionName(name);

  const booleanKey = BOOLEAN_OPTIONS[key];
  if (booleanKey) {
    const parsed = BooleanOptionValue.safeParse(value);
    if (!parsed.success) {
      return { success: false, message: `${value}: expected "true" or "false" for option value` };
    }
    return { success: true, options: { ...options, [booleanKey]: parsed.data } };
  }

  if (key === 'msereferenceimage' || key === 'msereferenceout') {
    const parsed = QuotedOptionValue.safeParse(value);
    if (!parsed.success) {
      return { success: false, message: `${value}: expected quoted string for option value` };
    }
    const field = key === 'msereferenceimage' ? 'mseReferenceImage' : 'mseReferenceOutput';
    return { success: true, options: { ...options, [field]: parsed.data } };
  }

  if (key === 'seed') {
    const parsed = IntegerOptionValue.safeParse(value);
    if (!parsed.success) {
      return { success: false, message: `${value}: expected integer for option value` };
    }
    return { success: true, options: { ...options, seed: parsed.data } };
  }

  return { success: false, message: `${name}: unknown option` };
}
