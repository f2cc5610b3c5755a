/**
 * @module graphwire/application/di
 * @description Field registration: the `@Inject` decorator and its
 * decorator-free counterpart
 *
 * @example
 * ```typescript
 * import { Inject } from 'graphwire';
 *
 * class OrderService {
 *   @Inject() repository!: OrderRepository;
 *   @Inject('private') scratch!: Map<string, Order>;
 * }
 * ```
 */

export { Inject, defineFields, registerField, fieldsOf } from './FieldRegistry';

export type { FieldOptions, FieldDefinition, FieldSpec } from './FieldRegistry';
