/**
 * @hoist/exec
 */

export { CommandExecutor, isErrorLine } from './executor.js';
export type { CommandRunner, ExecutorOptions } from './executor.js';
