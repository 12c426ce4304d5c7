import type { FileLoc } from '../ir/file-loc';
import { formatLoc } from '../ir/file-loc';

export type LogLevel = 'warning' | 'error';

export type LogHandler = (level: LogLevel, message: string, loc?: FileLoc) => void;

/** Console sink tagged with the emitting component, e.g. `[SceneBuilder]`. */
export function consoleLogHandler(tag: string): LogHandler {
  return (level, message, loc) => {
    const text = loc ? `[${tag}] ${formatLoc(loc)}: ${message}` : `[${tag}] ${message}`;
    if (level === 'error') console.error(text);
    else console.warn(text);
  };
}

/** Error for a condition that aborts interpretation. */
export function fatal(loc: FileLoc, message: string): Error {
  return new Error(`${formatLoc(loc)}: ${message}`);
}
