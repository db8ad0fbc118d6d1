import { describe, expect, it } from 'vitest';

import { bound, PathTemplate, pathTemplate } from '../core/path-template.js';

interface UserPath {
  userId: string | undefined;
}

interface MixedPath {
  text: string | undefined;
  count: number | undefined;
}

describe('PathTemplate', () => {
  it('should join literal and bound segments with single separators', () => {
    const template = PathTemplate.of<UserPath>('user', (p) => p.userId, 'profile');

    expect(template.resolve({ userId: '42' })).toBe('user/42/profile');
  });

  it('should elide absent and empty values without doubling separators', () => {
    const template = PathTemplate.of<UserPath>('user', (p) => p.userId, 'profile');

    expect(template.resolve({ userId: undefined })).toBe('user/profile');
    expect(template.resolve({ userId: '' })).toBe('user/profile');
  });

  it('should not insert a separator after a segment ending in one', () => {
    const template = PathTemplate.of<MixedPath>('testing/')
      .append((p) => p.text)
      .append((p) => p.count);

    expect(template.resolve({ text: 'first', count: 2 })).toBe('testing/first/2');
  });

  it('should render numbers in either position', () => {
    expect(PathTemplate.of<MixedPath>((p) => p.count, 'testing').resolve({ text: undefined, count: 2 })).toBe(
      '2/testing'
    );
    expect(PathTemplate.of('testing', 3).resolve()).toBe('testing/3');
  });

  it('should trim a separator left dangling by an empty last segment', () => {
    const template = pathTemplate<UserPath>`users/${(p) => p.userId}`;

    expect(template.resolve({ userId: undefined })).toBe('users');
    expect(template.resolve({ userId: '7' })).toBe('users/7');
  });

  it('should collapse separators around an elided middle segment', () => {
    const template = pathTemplate<MixedPath>`api/${(p) => p.text}/${(p) => p.count}`;

    expect(template.resolve({ text: 'v1', count: 5 })).toBe('api/v1/5');
    expect(template.resolve({ text: undefined, count: 5 })).toBe('api/5');
  });

  it('should keep a value that starts with a separator as is', () => {
    const template = PathTemplate.of<UserPath>('a', (p) => p.userId);

    expect(template.resolve({ userId: '/b' })).toBe('a/b');
  });

  it('should percent-encode string values but keep path characters', () => {
    const template = PathTemplate.of<UserPath>('files', (p) => p.userId);

    expect(template.resolve({ userId: 'my file.txt' })).toBe('files/my%20file.txt');
    expect(template.resolve({ userId: 'a:b@c=d' })).toBe('files/a:b@c=d');
    expect(template.resolve({ userId: 'q?x#y' })).toBe('files/q%3Fx%23y');
  });

  it('should render path-representable values verbatim', () => {
    const version = { toPathSegment: () => 'v%202' };
    const template = PathTemplate.of('api', version);

    expect(template.resolve()).toBe('api/v%202');
  });

  it('should order segments by index with ties kept in list order', () => {
    const template = PathTemplate.fromSegments([
      { includesSlash: true, index: 2, kind: 'literal', value: 'c' },
      { includesSlash: true, index: 0, kind: 'literal', value: 'a' },
      { includesSlash: true, index: 1, kind: 'literal', value: 'b1' },
      { includesSlash: true, index: 1, kind: 'literal', value: 'b2' },
    ]);

    expect(template.resolve()).toBe('a/b1/b2/c');
  });

  it('should re-index concatenated segments after the existing ones', () => {
    const head = PathTemplate.of<MixedPath>('a', (p) => p.text);
    const tail = PathTemplate.of<MixedPath>('b', (p) => p.count);

    const joined = head.concat(tail);

    expect(joined.segments.map((segment) => segment.index)).toEqual([0, 1, 2, 3]);
    expect(joined.resolve({ text: '1', count: 2 })).toBe('a/1/b/2');
  });

  it('should leave the original template untouched when appending', () => {
    const base = PathTemplate.of('users');
    const extended = base.append('active');

    expect(base.segments).toHaveLength(1);
    expect(extended.resolve()).toBe('users/active');
  });
});

describe('pathTemplate', () => {
  it('should keep literal text and separate interpolations', () => {
    const template = pathTemplate<UserPath>`user/${(p) => p.userId}/profile`;

    expect(template.resolve({ userId: '42' })).toBe('user/42/profile');
  });

  it('should honour interpolations that opt out of the separator', () => {
    const template = pathTemplate<MixedPath>`testing/testPath(Thing='${bound((p: MixedPath) => p.text, {
      includesSlash: false,
    })}')${(p) => p.count}`;

    expect(template.resolve({ text: 'first', count: 2 })).toBe("testing/testPath(Thing='first')/2");
    expect(template.resolve({ text: 'first', count: undefined })).toBe("testing/testPath(Thing='first')");
  });

  it('should insert separators around interpolated literals', () => {
    const template = pathTemplate<UserPath>`page${3}`;

    expect(template.resolve({ userId: undefined })).toBe('page/3');
  });
});
