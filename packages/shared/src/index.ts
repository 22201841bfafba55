export const name = '@exval/shared';

export * from './types/events';
export * from './types/execution';
export * from './logger';
export * from './errors';
export * from './config/schema';
export * from './fs/io';
export * from './value-codec';
export * from './string-utils';
