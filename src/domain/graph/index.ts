export { GraphObject } from './GraphObject';

export type { ObjectOptions, ObjectFlags } from './GraphObject';
