import { z } from 'zod';
import { COLOR_SPACES } from '../constants';
import { UNKNOWN_LOC } from './file-loc';

// ------------------------------------------------------------------
// Validation Types
// ------------------------------------------------------------------

export interface ValidationError {
  path: string[];
  message: string;
  code: string;
}

export type ValidationResult<T> =
  | { success: true; data: T }
  | { success: false; errors: ValidationError[] };

// ------------------------------------------------------------------
// Schemas
// ------------------------------------------------------------------

export const FileLocSchema = z.object({
  filename: z.string(),
  line: z.number().int(),
  column: z.number().int(),
});

export const ParsedParameterSchema = z.object({
  type: z.string().min(1),
  name: z.string().min(1),
  loc: FileLocSchema.default(UNKNOWN_LOC),
  numbers: z.array(z.number()).default([]),
  strings: z.array(z.string()).default([]),
  bools: z.array(z.boolean()).default([]),
  mayBeUnused: z.boolean().default(false),
  colorSpace: z.enum(COLOR_SPACES).optional(),
});

export const ParameterListSchema = z.array(ParsedParameterSchema);

/** One directive as handed over by the tokenizer: its keyword and positional arguments. */
export const DirectiveCallSchema = z.object({
  name: z.string().min(1),
  args: z.array(z.unknown()).default([]),
  loc: FileLocSchema.default(UNKNOWN_LOC),
});

export type DirectiveCall = z.infer<typeof DirectiveCallSchema>;
export type DirectiveCallInput = z.input<typeof DirectiveCallSchema>;

// ------------------------------------------------------------------
// Validator Function
// ------------------------------------------------------------------

export function toValidationErrors(error: z.ZodError): ValidationError[] {
  return error.issues.map(err => ({
    path: err.path.map(String),
    message: err.message,
    code: err.code,
  }));
}

export function formatValidationErrors(errors: readonly ValidationError[]): string {
  return errors.map(e => (e.path.length > 0 ? `${e.path.join('.')}: ${e.message}` : e.message)).join('; ');
}

export function validateDirectiveCall(json: unknown): ValidationResult<DirectiveCall> {
  const result = DirectiveCallSchema.safeParse(json);
  if (!result.success) {
    return { success: false, errors: toValidationErrors(result.error) };
  }
  return { success: true, data: result.data };
}
