import { DocumentStoreError } from '../../domain/index.js';

export type PathSegment =
  | { readonly kind: 'key'; readonly key: string }
  | { readonly kind: 'index'; readonly index: number };

/**
 * A parsed path: `head` is `$` for the document root, otherwise the bare
 * name that prefixed the segments (an explode alias or a column name).
 */
export interface ParsedPath {
  readonly head: string;
  readonly segments: readonly PathSegment[];
}

const HEAD_RE = /^(\$|[A-Za-z_][A-Za-z0-9_]*)/;
const DOTTED_KEY_RE = /^[\p{L}\p{N}_-]+/u;
const QUOTED_KEY_RE = /^\[(["'])((?:(?!\1)[^\\\p{Cc}])+)\1\]/u;
const INDEX_RE = /^\[(\d{1,9})\]/;

/**
 * Parses `$.a.b[0]["c d"]` style paths.
 *
 * Dotted keys are letters, digits, `_` and `-`. A bracketed key may hold
 * anything except its own quote character, a backslash or a control
 * character, so `["chef's picks"]` and `['food/drink']` are both keys.
 */
export function parseJsonPath(input: string): ParsedPath {
  const headMatch = HEAD_RE.exec(input);
  if (headMatch === null || headMatch[1] === undefined) {
    throw invalidPath(input, 'must start with "$" or a name');
  }

  const head = headMatch[1];
  const segments: PathSegment[] = [];
  let rest = input.slice(head.length);

  while (rest.length > 0) {
    if (rest.startsWith('.')) {
      const key = DOTTED_KEY_RE.exec(rest.slice(1));
      if (key === null) throw invalidPath(input, `bad key after "." at "${rest}"`);
      segments.push({ kind: 'key', key: key[0] });
      rest = rest.slice(1 + key[0].length);
      continue;
    }

    const index = INDEX_RE.exec(rest);
    if (index !== null && index[1] !== undefined) {
      segments.push({ kind: 'index', index: Number(index[1]) });
      rest = rest.slice(index[0].length);
      continue;
    }

    const quoted = QUOTED_KEY_RE.exec(rest);
    if (quoted !== null && quoted[2] !== undefined) {
      segments.push({ kind: 'key', key: quoted[2] });
      rest = rest.slice(quoted[0].length);
      continue;
    }

    throw invalidPath(input, `unexpected "${rest}"`);
  }

  return { head, segments };
}

/** Inverse of parseJsonPath for a document path; used to pre-shape requests. */
export function documentPath(...keys: string[]): string {
  return '$' + keys.map(pathSegment).join('');
}

function pathSegment(key: string): string {
  if (DOTTED_KEY_RE.exec(key)?.[0] === key) return `.${key}`;
  return key.includes('"') ? `['${key}']` : `["${key}"]`;
}

function invalidPath(input: string, reason: string): DocumentStoreError {
  return new DocumentStoreError('InvalidQuery', `Invalid path "${input}": ${reason}`);
}
