export const name = '@exval/exec';

export * from './runner/executor';
export * from './runner/pool';
export { killProcessTree, sandboxEnv } from './runner/process';
export * from './sandbox';
