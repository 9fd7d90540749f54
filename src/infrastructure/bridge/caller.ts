/** Source position a bridged record is attributed to. */
export interface CallerFrame {
  readonly file: string;
  readonly line: number;
  readonly column: number;
  readonly functionName: string;
}

/**
 * Strategy for finding the frame `depth` levels above `boundary`:
 * depth 1 is whoever called `boundary` directly.
 *
 * Must be invoked while `boundary` is still on the stack.
 */
export type CallerResolver = (
  depth: number,
  boundary: (...args: never[]) => unknown,
) => CallerFrame | undefined;

const FRAME_LINE = /^\s*at /;
const FRAME = /^\s*at (?:(.+?) \()?(.+):(\d+):(\d+)\)?$/;

/**
 * Parse one V8 stack line, e.g. `    at handle (/srv/app.js:10:3)`.
 * Native frames without a position yield undefined.
 */
export function parseStackFrame(line: string): CallerFrame | undefined {
  const match = FRAME.exec(line);
  if (match === null) return undefined;

  const [, name, file, lineNumber, column] = match;
  if (file === undefined || lineNumber === undefined || column === undefined) {
    return undefined;
  }

  return {
    file,
    line: Number(lineNumber),
    column: Number(column),
    functionName: name === undefined ? '<anonymous>' : name.replace(/^async /, ''),
  };
}

/**
 * Best-effort resolver built on V8's Error.captureStackTrace. Frames of
 * `boundary` and everything it called are cut off before counting.
 * Runtimes without captureStackTrace get no attribution.
 */
export const resolveStackCaller: CallerResolver = (depth, boundary) => {
  if (typeof Error.captureStackTrace !== 'function') return undefined;

  const holder: { stack?: string } = {};
  const previousLimit = Error.stackTraceLimit;
  Error.stackTraceLimit = Math.max(previousLimit, depth + 1);
  try {
    Error.captureStackTrace(holder, boundary);
  } finally {
    Error.stackTraceLimit = previousLimit;
  }

  const frames = (holder.stack ?? '').split('\n').filter((line) => FRAME_LINE.test(line));
  const target = frames[depth - 1];
  return target === undefined ? undefined : parseStackFrame(target);
};
