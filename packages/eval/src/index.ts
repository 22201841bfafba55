export const name = '@exval/eval';

export * from './verdict';
export * from './validator';
export * from './renderer';
export * from './artifact/builder';
export * from './artifact/bundle';
