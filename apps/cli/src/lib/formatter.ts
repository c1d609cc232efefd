/**
 * @hoist/cli - Result Formatting
 */

import chalk from 'chalk';
import type { DeploymentConfig, PipelineResult, PipelineStep } from '@hoist/shared';

const STATUS_ICON: Record<PipelineStep['status'], string> = {
  success: chalk.green('✔'),
  failed: chalk.red('✖'),
  skipped: chalk.gray('-'),
};

export function formatSteps(result: PipelineResult): string {
  const width = Math.max(0, ...result.steps.map(step => step.name.length));
  const lines = result.steps.map((step) => {
    const detail = step.error ?? step.output ?? '';
    const timing = chalk.gray(`${step.duration}ms`);
    const text = step.status === 'failed' ? chalk.red(detail) : chalk.gray(detail);
    return `  ${STATUS_ICON[step.status]} ${step.name.padEnd(width)}  ${timing}  ${text}`.trimEnd();
  });

  lines.push(chalk.gray(`\n  Total: ${(result.duration / 1000).toFixed(1)}s`));
  return lines.join('\n');
}

export function formatTarget(config: DeploymentConfig): string {
  return [
    chalk.gray(`Host:       ${config.user}@${config.host}`),
    chalk.gray(`Image:      ${config.image}:${config.tag}`),
    chalk.gray(`Container:  ${config.containerName} (${config.hostPort}:${config.containerPort})`),
  ].join('\n');
}
