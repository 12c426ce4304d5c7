/**
 * Source position of a directive or parameter, used only for diagnostics.
 */
export interface FileLoc {
  filename: string;
  line: number;
  column: number;
}

export const UNKNOWN_LOC: FileLoc = Object.freeze({ filename: '<unknown>', line: 0, column: 0 });

export function formatLoc(loc: FileLoc): string {
  return `${loc.filename}:${loc.line}:${loc.column}`;
}
