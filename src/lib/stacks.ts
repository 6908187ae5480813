export type Loc = { readonly file: string; readonly line: number };

export const isStackLine = (line: string) => /\s+at\s+/.test(line);

const FRAME_IN_PARENS = /\(([^()]+?):(\d+):\d+\)\s*$/;
const BARE_FRAME = /\s+at\s+([^\s()]+?):(\d+):\d+\s*$/;

const normalizeFile = (file: string): string =>
  file.replace(/^file:\/\//, '').replace(/\\/g, '/');

export const parseFrameLocation = (line: string): Loc | undefined => {
  if (!isStackLine(line)) {
    return undefined;
  }
  const match = line.match(FRAME_IN_PARENS) ?? line.match(BARE_FRAME);
  if (!match) {
    return undefined;
  }
  const [, file, lineText] = match;
  if (file === undefined || lineText === undefined) {
    return undefined;
  }
  return { file: normalizeFile(file), line: Number(lineText) };
};

export const firstFrameLocation = (stack: string): Loc | undefined => {
  for (const ln of stack.split(/\r?\n/)) {
    const loc = parseFrameLocation(ln);
    if (loc) {
      return loc;
    }
  }
  return undefined;
};

type StackBoundary = (...args: never[]) => unknown;

/**
 * Location of whoever called `boundary`. Frames for `boundary` and everything
 * above it are dropped by V8 before the stack is rendered.
 */
export const captureCallerLocation = (boundary: StackBoundary): Loc | undefined => {
  const holder: { stack?: string } = {};
  Error.captureStackTrace(holder, boundary);
  return holder.stack ? firstFrameLocation(holder.stack) : undefined;
};

export const formatLocation = (loc: Loc | undefined): string =>
  loc ? `${loc.file}:${loc.line}` : '<unknown location>';
