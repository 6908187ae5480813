import JSON5 from 'json5';
import { isPlainObject } from 'es-toolkit';

/** Iterables longer than this are truncated when rendered. */
export const CONTAINER_DISPLAY_LIMIT = 10;

export const UNPRINTABLE = '???';

const TUPLE = Symbol('testbound.tuple');

/**
 * A fixed-arity composite rendered as `<a, b, ...>`. Map entries are shown the
 * same way.
 */
export type Tuple<T extends readonly unknown[] = readonly unknown[]> = {
  readonly [TUPLE]: true;
  readonly items: T;
};

export const tuple = <T extends readonly unknown[]>(...items: T): Tuple<T> => ({
  [TUPLE]: true,
  items,
});

export const isTuple = (value: unknown): value is Tuple =>
  typeof value === 'object' && value !== null && TUPLE in value;

type Renderer = {
  readonly accepts: (value: unknown) => boolean;
  readonly render: (value: unknown) => string;
};

const renderers: Renderer[] = [];

/**
 * Teach the diagnostics how to print a type that has no natural text form.
 * Returns a function that removes the renderer again.
 */
export const registerRenderer = <T>(
  accepts: (value: unknown) => value is T,
  render: (value: T) => string,
): (() => void) => {
  const renderer: Renderer = {
    accepts,
    render: (value) => (accepts(value) ? render(value) : UNPRINTABLE),
  };
  renderers.push(renderer);
  return () => {
    const index = renderers.indexOf(renderer);
    if (index >= 0) {
      renderers.splice(index, 1);
    }
  };
};

const isIterable = (value: object): value is Iterable<unknown> =>
  Symbol.iterator in value && typeof value[Symbol.iterator] === 'function';

const knownSize = (value: object): number | undefined => {
  if (Array.isArray(value) || ArrayBuffer.isView(value)) {
    return 'length' in value && typeof value.length === 'number' ? value.length : undefined;
  }
  if (value instanceof Set || value instanceof Map) {
    return value.size;
  }
  return undefined;
};

const hasOwnTextForm = (value: object): boolean => {
  const { toString } = value;
  return (
    typeof toString === 'function' &&
    toString !== Object.prototype.toString &&
    toString !== Array.prototype.toString &&
    toString !== Function.prototype.toString
  );
};

const renderString = (text: string): string =>
  [...text].length === 1 ? `'${text}'` : `"${text}"`;

const renderSequence = (
  items: Iterable<unknown>,
  size: number | undefined,
  renderItem: (item: unknown) => string,
): string => {
  const parts: string[] = [];
  let truncated = false;
  for (const item of items) {
    if (parts.length >= CONTAINER_DISPLAY_LIMIT) {
      truncated = true;
      break;
    }
    parts.push(renderItem(item));
  }
  if (!truncated) {
    return `[${parts.join(', ')}]`;
  }
  const omitted =
    size === undefined ? '...' : `... (${size - CONTAINER_DISPLAY_LIMIT} additional elements)`;
  return `[${[...parts, omitted].join(', ')}]`;
};

const renderMapEntry = (entry: unknown): string =>
  Array.isArray(entry) ? `<${entry.map(render).join(', ')}>` : render(entry);

const renderDate = (date: Date): string =>
  Number.isNaN(date.getTime()) ? 'Invalid Date' : date.toISOString();

const renderObject = (value: object): string => {
  if (isTuple(value)) {
    return `<${value.items.map(render).join(', ')}>`;
  }
  if (value instanceof Date) {
    return renderDate(value);
  }
  if (value instanceof Map) {
    return renderSequence(value, value.size, renderMapEntry);
  }
  if (hasOwnTextForm(value)) {
    return String(value);
  }
  if (isIterable(value)) {
    return renderSequence(value, knownSize(value), render);
  }
  if (isPlainObject(value)) {
    return JSON5.stringify(value);
  }
  return UNPRINTABLE;
};

function render(value: unknown): string {
  for (const renderer of renderers) {
    if (renderer.accepts(value)) {
      return renderer.render(value);
    }
  }
  switch (typeof value) {
    case 'string':
      return renderString(value);
    case 'boolean':
      return value ? 'true' : 'false';
    case 'number':
    case 'bigint':
      return String(value);
    case 'symbol':
      return value.toString();
    case 'undefined':
      return 'undefined';
    case 'function':
      return UNPRINTABLE;
    case 'object':
      return value === null ? 'null' : renderObject(value);
    default:
      return UNPRINTABLE;
  }
}

/**
 * Text used for a value inside assertion diagnostics. Never used for equality
 * and never throws: a renderer, `toString` or iterator that throws yields `???`.
 */
export const getStringRepr = (value: unknown): string => {
  try {
    return render(value);
  } catch {
    return UNPRINTABLE;
  }
};
