export type Colorize = (text: string) => string;

export const colorEnabledByDefault = (): boolean =>
  Boolean(process.stdout.isTTY) && !process.env.NO_COLOR;

const sgr =
  (open: string, close: string): Colorize =>
  (text) =>
    `\u001b[${open}m${text}\u001b[${close}m`;

const parseHex = (hex: string): readonly [number, number, number] => {
  const normalized = hex.replace(/^#/, '').trim();
  const full =
    normalized.length === 3
      ? normalized
          .split('')
          .map((char) => char + char)
          .join('')
      : normalized;
  const channel = (start: number) => parseInt(full.slice(start, start + 2), 16);
  return [channel(0), channel(2), channel(4)] as const;
};

const colorHex = (hex: string): Colorize => {
  const [red, green, blue] = parseHex(hex);
  return sgr(`38;2;${red};${green};${blue}`, '39');
};

export type Palette = {
  readonly Success: Colorize;
  readonly Failure: Colorize;
  readonly Error: Colorize;
  readonly Warn: Colorize;
  readonly Note: Colorize;
  readonly bold: Colorize;
  readonly dim: Colorize;
};

const vivid: Palette = {
  Success: colorHex('#22c55e'),
  Failure: colorHex('#ff2323'),
  Error: colorHex('#f97316'),
  Warn: colorHex('#eab308'),
  Note: colorHex('#38bdf8'),
  bold: sgr('1', '22'),
  dim: sgr('2', '22'),
};

const identity: Colorize = (text) => text;

const plain: Palette = {
  Success: identity,
  Failure: identity,
  Error: identity,
  Warn: identity,
  Note: identity,
  bold: identity,
  dim: identity,
};

export const paletteFor = (useColor: boolean): Palette => (useColor ? vivid : plain);

/** Palette for ad-hoc console output, decided once from the terminal. */
export const Colors: Palette = paletteFor(colorEnabledByDefault());

export const supportsUnicode = (): boolean => {
  const term = String(process.env.TERM ?? '').toLowerCase();
  return Boolean(process.env.WT_SESSION) || (Boolean(term) && term !== 'dumb');
};
