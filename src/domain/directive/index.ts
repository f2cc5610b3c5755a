/**
 * graphwire - Directive Module
 */

export { parseDirective, DirectiveCache, PLAIN, INLINE, PRIVATE } from './Directive';

export type { Directive, DirectiveKind } from './Directive';
