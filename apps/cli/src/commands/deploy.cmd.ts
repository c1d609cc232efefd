/**
 * @hoist/cli - Deploy / Rollback Action
 *
 * One process runs exactly one pipeline: deploy by default, rollback with
 * --rollback. Resolves with the exit code.
 */

import chalk from 'chalk';
import ora from 'ora';
import { DEFAULT_LOG_FILE, getVersion, toHoistError } from '@hoist/shared';
import type { DeploymentConfig, PipelineResult } from '@hoist/shared';
import { closeLogger, createLogger, watchWriteFailures } from '@hoist/logger';
import type { LogFailureCheck, Logger } from '@hoist/logger';
import { CommandExecutor } from '@hoist/exec';
import { createDeploymentServices } from '@hoist/deployment';
import { resolveConfig } from '../lib/config.js';
import type { CliOptions } from '../lib/config.js';
import { formatSteps, formatTarget } from '../lib/formatter.js';

export async function runPipeline(
  options: CliOptions,
  env: NodeJS.ProcessEnv = process.env,
  version: string = getVersion(env),
): Promise<number> {
  const file = options.logFile ?? env.HOIST_LOG_FILE ?? DEFAULT_LOG_FILE;

  let logger: Logger;
  try {
    logger = createLogger({ file, level: env.LOG_LEVEL ?? 'info' });
  } catch (error) {
    console.error(chalk.red(`Error: ${toHoistError(error).message}`));
    return 1;
  }

  // a failed write stops the next command and fails the run
  const logFailure = watchWriteFailures(logger, file);

  const exitCode = await run(options, env, version, logger, logFailure);

  // entries still queued may fail after the pipeline returned
  await closeLogger(logger);
  const failure = logFailure();
  if (failure) {
    ora().fail(failure.message);
    return 1;
  }

  return exitCode;
}

async function run(
  options: CliOptions,
  env: NodeJS.ProcessEnv,
  version: string,
  logger: Logger,
  logFailure: LogFailureCheck,
): Promise<number> {
  let config: DeploymentConfig;
  try {
    config = resolveConfig(options, env, version);
  } catch (error) {
    const failure = toHoistError(error);
    logger.error('Invalid configuration', { detail: failure.message });
    return 1;
  }

  const mode = config.rollback ? 'Rollback' : 'Deployment';
  console.log(chalk.blue.bold(`\n-- hoist v${config.version}: ${mode} --\n`));
  console.log(formatTarget(config));
  console.log('');

  const executor = new CommandExecutor(logger, { logFailure });
  const services = createDeploymentServices(config, executor, logger);
  const result: PipelineResult = config.rollback
    ? await services.rollback.execute()
    : await services.deploy.execute();

  console.log('');
  console.log(formatSteps(result));

  if (!result.success) {
    ora().fail(`${mode} failed: ${result.error?.message ?? 'Unknown error'}`);
    return 1;
  }

  ora().succeed(`${mode} completed`);
  return 0;
}
