/**
 * graphwire - Injection Directives
 *
 * A directive tells the resolver how to satisfy one field. It is written as
 * the annotation string handed to `@Inject`:
 *
 * | Annotation            | Directive                                  |
 * |-----------------------|--------------------------------------------|
 * | (no decorator)        | none, the field is not the graph's concern |
 * | `''`                  | plain: reuse the shared instance or create |
 * | `'inline'`            | traverse into a by-value record            |
 * | `'private'`           | always create a fresh, unshared instance   |
 * | `'db'`, `'db,opts'`   | bind the object named `db`                 |
 */

import { MalformedDirectiveError } from '../exceptions';

export type Directive =
  | { readonly kind: 'plain' }
  | { readonly kind: 'inline' }
  | { readonly kind: 'private' }
  | { readonly kind: 'named'; readonly name: string };

export type DirectiveKind = Directive['kind'];

export const PLAIN: Directive = Object.freeze({ kind: 'plain' });
export const INLINE: Directive = Object.freeze({ kind: 'inline' });
export const PRIVATE: Directive = Object.freeze({ kind: 'private' });

/**
 * Parse a raw annotation
 *
 * @returns The directive, or `null` when the annotation is absent
 * @throws {MalformedDirectiveError} For a dangling delimiter, a blank name or
 *   an unterminated quote
 */
export function parseDirective(annotation: string | undefined): Directive | null {
  if (annotation === undefined) return null;

  switch (annotation) {
    case '':
      return PLAIN;
    case 'inline':
      return INLINE;
    case 'private':
      return PRIVATE;
  }

  // Only the first comma segment is significant; the rest are options.
  const [head] = annotation.split(',');
  const name = unquote(annotation, head.trim());

  if (name === '') {
    throw new MalformedDirectiveError(
      annotation,
      annotation.includes(',') ? 'dangling delimiter' : 'no value',
    );
  }

  return Object.freeze({ kind: 'named', name });
}

function unquote(annotation: string, segment: string): string {
  const quoted = segment.startsWith('"');
  const closed = quoted && segment.length > 1 && segment.endsWith('"');

  if (quoted && !closed) {
    throw new MalformedDirectiveError(annotation, 'unterminated quoted value');
  }

  const inner = quoted ? segment.slice(1, -1) : segment;
  if (inner.includes('"')) {
    throw new MalformedDirectiveError(annotation, 'stray quote');
  }
  return inner.trim();
}

/**
 * Memoised parser. Identical annotations share one parsed directive,
 * whichever field or class they come from. Failed parses are not cached.
 */
export class DirectiveCache {
  private readonly cache = new Map<string, Directive | null>();

  parse(annotation: string | undefined): Directive | null {
    if (annotation === undefined) return null;

    const cached = this.cache.get(annotation);
    if (cached !== undefined) return cached;

    const directive = parseDirective(annotation);
    this.cache.set(annotation, directive);
    return directive;
  }

  get size(): number {
    return this.cache.size;
  }
}
