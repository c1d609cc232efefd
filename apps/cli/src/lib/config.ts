/**
 * @hoist/cli - Flag and Environment Resolution
 *
 * Flag > environment variable > schema default. The result is validated and
 * frozen before any pipeline sees it.
 */

import { homedir } from 'node:os';
import { join } from 'node:path';
import { getVersion, parseDeploymentConfig } from '@hoist/shared';
import type { DeploymentConfig } from '@hoist/shared';

/** What commander hands the action, after camel-casing the flags. */
export interface CliOptions {
  host?: string;
  user?: string;
  image?: string;
  dockerfile?: string;
  tag?: string;
  platform?: string;
  sshKey?: string;
  containerName?: string;
  containerPort?: string;
  hostPort?: string;
  envFile?: string;
  buildArg?: string[];
  volume?: string[];
  network?: string;
  cpus?: string;
  memory?: string;
  rollback?: boolean;
  logFile?: string;
}

/** Flags that fall back to an environment variable. */
export const ENV_FALLBACKS = {
  host: 'HOST',
  user: 'HOST_USER',
  image: 'DOCKER_IMAGE_NAME',
  tag: 'DOCKER_IMAGE_TAG',
  platform: 'HOST_PLATFORM',
  sshKey: 'SSH_KEY_PATH',
  containerName: 'DOCKER_CONTAINER_NAME',
  containerPort: 'DOCKER_CONTAINER_PORT',
  hostPort: 'HOST_PORT',
  envFile: 'DOCKER_CONTAINER_ENV_FILE',
  network: 'DOCKER_NETWORK',
  cpus: 'DOCKER_CPUS',
  memory: 'DOCKER_MEMORY',
} as const;

type EnvBackedKey = keyof typeof ENV_FALLBACKS;

/**
 * `KEY=VALUE` entries into a map. Entries without `=` or with an empty key
 * are dropped; the value may itself contain `=`.
 */
export function parseAssignments(entries: readonly string[]): Record<string, string> {
  const parsed: Record<string, string> = {};
  for (const entry of entries) {
    const eq = entry.indexOf('=');
    if (eq <= 0) continue;
    parsed[entry.slice(0, eq)] = entry.slice(eq + 1);
  }
  return parsed;
}

export function expandHome(path: string, home: string = homedir()): string {
  return path.startsWith('~/') ? join(home, path.slice(2)) : path;
}

export function resolveConfig(
  options: CliOptions,
  env: NodeJS.ProcessEnv = process.env,
  version: string = getVersion(env),
): DeploymentConfig {
  const pick = (key: EnvBackedKey): string | undefined => options[key] ?? env[ENV_FALLBACKS[key]];

  // values from DOCKER_BUILD_ARGS win over --build-arg for the same key
  const buildArgs = {
    ...parseAssignments(options.buildArg ?? []),
    ...parseAssignments((env.DOCKER_BUILD_ARGS ?? '').split(',')),
  };

  const sshKey = pick('sshKey');

  return parseDeploymentConfig({
    host: pick('host'),
    user: pick('user'),
    image: pick('image'),
    dockerfile: options.dockerfile,
    tag: pick('tag'),
    platform: pick('platform'),
    sshKey: sshKey === undefined ? undefined : expandHome(sshKey),
    containerName: pick('containerName'),
    containerPort: pick('containerPort'),
    hostPort: pick('hostPort'),
    envFile: pick('envFile'),
    network: pick('network'),
    cpus: pick('cpus'),
    memory: pick('memory'),
    volumes: options.volume ?? [],
    buildArgs,
    rollback: options.rollback ?? false,
    version,
  });
}
