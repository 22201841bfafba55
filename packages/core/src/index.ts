export const name = '@exval/core';

export * from './schema/types';
export * from './schema/raw';
export * from './schema/parser';
export * from './schema/schema';
export * from './schema/conformance';
export * from './schema/domain';
export * from './schema/loader';
export * from './random';
export * from './equivalence/equivalence';
export * from './generator/types';
export * from './generator/generator';
export * from './generator/strategies';
export * from './config/loader';
