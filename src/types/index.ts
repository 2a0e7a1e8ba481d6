export type * from './descriptors';
export { describeType } from './describe';
export * as t from './builders';
