import { FORMAT_INDENT } from '../constants';
import type { FileLoc } from '../ir/file-loc';
import { formatLoc } from '../ir/file-loc';

export type ScopeKind = 'attribute' | 'transform' | 'object';

export interface ScopeEntry {
  kind: ScopeKind;
  loc: FileLoc;
}

export type PopResult =
  | { success: true; entry: ScopeEntry }
  | { success: false; message: string };

export const BEGIN_DIRECTIVE: Record<ScopeKind, string> = {
  attribute: 'AttributeBegin',
  transform: 'TransformBegin',
  object: 'ObjectBegin',
};

export const END_DIRECTIVE: Record<ScopeKind, string> = {
  attribute: 'AttributeEnd',
  transform: 'TransformEnd',
  object: 'ObjectEnd',
};

/**
 * LIFO record of the open Begin/End scopes.
 *
 * Shared by the scene builder (scope validation) and the formatter, whose
 * indentation is derived from `depth` so the two can never drift apart.
 */
export class NestingStack {
  private entries: ScopeEntry[] = [];

  push(kind: ScopeKind, loc: FileLoc) {
    this.entries.push({ kind, loc });
  }

  /**
   * Pops the innermost scope if it is of `kind`. On mismatch the stack is
   * left untouched and the message names the still-open Begin's location.
   */
  pop(kind: ScopeKind, loc: FileLoc): PopResult {
    const top = this.entries[this.entries.length - 1];
    if (!top) {
      return { success: false, message: `${formatLoc(loc)}: Unmatched ${END_DIRECTIVE[kind]} encountered` };
    }
    if (top.kind !== kind) {
      return {
        success: false,
        message: `${formatLoc(loc)}: Mismatched nesting: open ${BEGIN_DIRECTIVE[top.kind]} from ${formatLoc(top.loc)} at ${END_DIRECTIVE[kind]}`,
      };
    }
    this.entries.pop();
    return { success: true, entry: top };
  }

  /** Pops or throws with the mismatch message. */
  popOrThrow(kind: ScopeKind, loc: FileLoc): ScopeEntry {
    const result = this.pop(kind, loc);
    if (!result.success) throw new Error(result.message);
    return result.entry;
  }

  /** Empties the stack, returning the open scopes innermost first. */
  drain(): ScopeEntry[] {
    const open = this.entries.reverse();
    this.entries = [];
    return open;
  }

  get depth(): number {
    return this.entries.length;
  }

  get top(): ScopeEntry | undefined {
    return this.entries[this.entries.length - 1];
  }

  /** Leading whitespace for a line at the current depth plus `extra` levels. */
  indent(extra = 0): string {
    return ' '.repeat(FORMAT_INDENT * (this.entries.length + extra));
  }
}
