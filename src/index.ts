/**
 * @fileoverview graphwire - object graph auto-wiring
 * @description
 * Fills in the missing fields of a set of objects by reusing, looking up or
 * creating compatible objects, following the directives declared on each
 * field with `@Inject`.
 *
 * ## Layers
 *
 * - **domain**: type descriptors, directives, graph objects, errors
 * - **application**: field registry, graph store, resolver, container
 *
 * @packageDocumentation
 * @module graphwire
 */

import 'reflect-metadata';

export * from './domain';
export * from './application';
