import type { LogHandler, LogLevel } from '../interpreter/diagnostics';
import type { FileLoc } from '../ir/file-loc';
import { makeParameter } from '../ir/parameters';
import type { ParameterValue, ParsedParameter } from '../ir/parameters';

export const SCENE_FILE = 'scene.pbrt';

export function at(line: number, column = 1): FileLoc {
  return { filename: SCENE_FILE, line, column };
}

export function param(type: string, name: string, ...values: ParameterValue[]): ParsedParameter {
  return makeParameter(type, name, values, at(0));
}

export interface LogEntry {
  level: LogLevel;
  message: string;
  loc?: FileLoc;
}

/** A log handler that records instead of printing. */
export function recordingLog(): { entries: LogEntry[]; handler: LogHandler } {
  const entries: LogEntry[] = [];
  return { entries, handler: (level, message, loc) => entries.push({ level, message, loc }) };
}
