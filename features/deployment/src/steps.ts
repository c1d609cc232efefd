/**
 * Step bookkeeping shared by the deploy and rollback pipelines.
 */

import { toHoistError } from '@hoist/shared';
import type { PipelineStep } from '@hoist/shared';

/**
 * Run one pipeline stage, recording its duration and outcome in `steps`.
 * Failures are recorded and rethrown; the pipeline decides what happens next.
 */
export async function runStep<T>(
  steps: PipelineStep[],
  name: string,
  fn: () => Promise<T>,
  describe?: (value: T) => string,
): Promise<T> {
  const stepStart = Date.now();
  try {
    const value = await fn();
    steps.push({
      name,
      status: 'success',
      duration: Date.now() - stepStart,
      output: describe?.(value),
    });
    return value;
  } catch (error) {
    steps.push({
      name,
      status: 'failed',
      duration: Date.now() - stepStart,
      error: toHoistError(error).message,
    });
    throw error;
  }
}

export function skipStep(steps: PipelineStep[], name: string, output: string): void {
  steps.push({ name, status: 'skipped', duration: 0, output });
}
