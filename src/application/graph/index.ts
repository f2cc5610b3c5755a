/**
 * @module graphwire/application/graph
 * @description Graph store and resolver
 */

export { Graph, populate } from './Graph';
export { Resolver } from './Resolver';
export { isZero, isWritable } from './values';

export type { IGraph, GraphOptions } from './Graph';
