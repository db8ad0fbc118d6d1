import { toPathSegment, type PathValue } from './representable.js';

export type PathAccessor<P> = (components: P) => PathValue;

export interface SegmentOptions {
  /** Request a `/` before this segment. */
  includesSlash?: boolean | undefined;
}

export type PathSegment<P> =
  | { readonly kind: 'literal'; readonly index: number; readonly includesSlash: boolean; readonly value: PathValue }
  | {
      readonly kind: 'bound';
      readonly index: number;
      readonly includesSlash: boolean;
      readonly accessor: PathAccessor<P>;
    };

/**
 * An accessor with an explicit separator choice, for use inside `pathTemplate`.
 */
export class BoundPart<P> {
  constructor(
    readonly accessor: PathAccessor<P>,
    readonly includesSlash: boolean
  ) {}
}

export type PathPart<P> = Exclude<PathValue, null | undefined> | PathAccessor<P> | BoundPart<P>;

export function bound<P>(accessor: PathAccessor<P>, options: SegmentOptions = {}): BoundPart<P> {
  return new BoundPart(accessor, options.includesSlash ?? true);
}

function toSegment<P>(part: PathPart<P>, index: number, includesSlash: boolean): PathSegment<P> {
  if (part instanceof BoundPart) {
    return { accessor: part.accessor, includesSlash: part.includesSlash, index, kind: 'bound' };
  }
  if (typeof part === 'function') {
    return { accessor: part, includesSlash, index, kind: 'bound' };
  }
  return { includesSlash, index, kind: 'literal', value: part };
}

/**
 * Ordered list of literal and deferred path segments. Immutable: `append`
 * and `concat` return new templates.
 */
export class PathTemplate<P = void> {
  private constructor(readonly segments: readonly PathSegment<P>[]) {}

  static empty<P = void>(): PathTemplate<P> {
    return new PathTemplate<P>([]);
  }

  /**
   * Template whose parts are joined with `/`.
   */
  static of<P = void>(...parts: PathPart<P>[]): PathTemplate<P> {
    return parts.reduce<PathTemplate<P>>((template, part) => template.append(part), PathTemplate.empty<P>());
  }

  /**
   * Build from explicit segments. Order comes from each segment's index,
   * ties keep list order.
   */
  static fromSegments<P = void>(segments: readonly PathSegment<P>[]): PathTemplate<P> {
    return new PathTemplate<P>([...segments]);
  }

  get nextIndex(): number {
    return this.segments.reduce((max, segment) => Math.max(max, segment.index + 1), 0);
  }

  append(part: PathPart<P>, options: SegmentOptions = {}): PathTemplate<P> {
    const segment = toSegment(part, this.nextIndex, options.includesSlash ?? true);
    return new PathTemplate<P>([...this.segments, segment]);
  }

  /**
   * Append another template's segments, re-indexed to continue after this
   * template's last segment.
   */
  concat(other: PathTemplate<P>): PathTemplate<P> {
    const offset = this.nextIndex;
    const ordered = [...other.segments].sort((a, b) => a.index - b.index);
    const reindexed = ordered.map((segment, position) => ({ ...segment, index: offset + position }));
    return new PathTemplate<P>([...this.segments, ...reindexed]);
  }

  resolve(components: P): string {
    const rendered = [...this.segments]
      .sort((a, b) => a.index - b.index)
      .map((segment) => ({
        includesSlash: segment.includesSlash,
        text: toPathSegment(segment.kind === 'literal' ? segment.value : segment.accessor(components)),
      }));

    let path = '';
    rendered.forEach((segment, position) => {
      if (segment.text === '') {
        if (position === rendered.length - 1 && path.endsWith('/')) {
          path = path.slice(0, -1);
        }
        return;
      }
      if (segment.includesSlash && path !== '' && !path.endsWith('/') && !segment.text.startsWith('/')) {
        path += '/';
      }
      path += segment.text;
    });

    return path.replace(/\/{2,}/g, '/');
  }
}

/**
 * Tagged template for paths. Literal text is kept as written; each
 * interpolation is preceded by `/` unless the text already ends in one or
 * it is wrapped with `bound(accessor, { includesSlash: false })`.
 *
 * @example
 * pathTemplate<{ userId: string }>`user/${(p) => p.userId}/profile`
 */
export function pathTemplate<P = void>(strings: TemplateStringsArray, ...parts: PathPart<P>[]): PathTemplate<P> {
  const segments: PathSegment<P>[] = [];
  strings.forEach((text, position) => {
    if (text !== '') {
      segments.push(toSegment<P>(text, segments.length, false));
    }
    const part = parts[position];
    if (part !== undefined) {
      segments.push(toSegment(part, segments.length, true));
    }
  });
  return PathTemplate.fromSegments(segments);
}
