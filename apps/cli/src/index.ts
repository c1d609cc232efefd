/**
 * @hoist/cli - Commander Program Definition
 *
 * Single command: every setting is a flag with an environment fallback.
 *   hoist --host example.com --user deploy      build, ship, restart
 *   hoist --host example.com --user deploy --rollback
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { DEFAULTS, DEFAULT_LOG_FILE, getVersion } from '@hoist/shared';
import { runPipeline } from './commands/deploy.cmd.js';
import type { CliOptions } from './lib/config.js';
import { ENV_FALLBACKS } from './lib/config.js';

export { runPipeline } from './commands/deploy.cmd.js';
export { resolveConfig, parseAssignments, expandHome, ENV_FALLBACKS } from './lib/config.js';
export type { CliOptions } from './lib/config.js';

// ============================================================================
// Version (HOIST_VERSION or the VERSION file)
// ============================================================================

const VERSION = getVersion();

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

// ============================================================================
// Program Factory
// ============================================================================

export function createCLI(): Command {
  const program = new Command();

  program
    .name('hoist')
    .description('Build a Docker image, ship it over SSH and restart the remote container')
    .version(VERSION, '-v, --version', 'Show version information')
    .option('--host <host>', 'Remote host to deploy to')
    .option('--user <user>', 'SSH user for remote host')
    .option('--image <name>', `Docker image name (default: ${DEFAULTS.image})`)
    .option('--dockerfile <path>', `Path to the Dockerfile (default: ${DEFAULTS.dockerfile})`)
    .option('--tag <tag>', `Docker image tag (default: ${DEFAULTS.tag})`)
    .option('--platform <platform>', `Docker platform (default: ${DEFAULTS.platform})`)
    .option('--ssh-key <path>', 'Path to SSH key')
    .option('--container-name <name>', `Name for the container (default: ${DEFAULTS.containerName})`)
    .option('--container-port <port>', `Container port (default: ${DEFAULTS.containerPort})`)
    .option('--host-port <port>', `Host port (default: ${DEFAULTS.hostPort})`)
    .option('--env-file <path>', 'Environment file copied to the remote home directory')
    .option('--build-arg <KEY=VALUE>', 'Build argument (repeatable)', collect, [])
    .option('--volume <host:container>', 'Volume mount (repeatable)', collect, [])
    .option('--network <network>', 'Docker network to connect to')
    .option('--cpus <cpus>', "Number of CPUs (e.g. '0.5' or '2')")
    .option('--memory <limit>', "Memory limit (e.g. '512m' or '2g')")
    .option('--rollback', 'Rollback to the previous version')
    .option('--log-file <path>', `Log file (default: ${DEFAULT_LOG_FILE})`)
    .action(async (options: CliOptions) => {
      process.exitCode = await runPipeline(options, process.env, VERSION);
    });

  // ========================================================================
  // Custom Help
  // ========================================================================
  program.on('--help', () => {
    console.log('');
    console.log(chalk.yellow('Environment Variables:'));
    for (const [key, variable] of Object.entries(ENV_FALLBACKS)) {
      console.log(chalk.gray(`  ${variable.padEnd(26)} --${toFlag(key)}`));
    }
    console.log(chalk.gray(`  ${'DOCKER_BUILD_ARGS'.padEnd(26)} comma-separated KEY=VALUE pairs`));
    console.log(chalk.gray(`  ${'HOIST_LOG_FILE'.padEnd(26)} --log-file`));
    console.log(chalk.gray(`  ${'LOG_LEVEL'.padEnd(26)} error | warn | info | debug`));
    console.log('');
    console.log(chalk.yellow('Examples:'));
    console.log(chalk.cyan('  hoist --host example.com --user deploy'));
    console.log(chalk.cyan('  hoist --host example.com --user deploy --build-arg VERSION=1.0.0 --build-arg ENV=prod'));
    console.log(chalk.cyan('  hoist --env-file .env.production --build-arg GIT_HASH=$(git rev-parse HEAD)'));
    console.log(chalk.cyan('  hoist --host example.com --user deploy --cpus "0.5" --memory "512m"'));
    console.log(chalk.cyan('  hoist --rollback'));
    console.log('');
  });

  // Error handling
  program.configureOutput({
    outputError: (str, write) => {
      write(chalk.red(`\nError: ${str}`));
    },
  });

  return program;
}

function toFlag(key: string): string {
  return key.replace(/[A-Z]/g, letter => `-${letter.toLowerCase()}`);
}
