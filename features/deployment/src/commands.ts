/**
 * Docker command templates
 *
 * Every command line hoist sends anywhere is composed here, one function per
 * operation. Config values are substituted without escaping, so anything that
 * widens what reaches a shell belongs in this file and nowhere else.
 *
 * Remote templates return the inner command; SSHTransport adds the ssh prefix.
 */

import { BACKUP_SUFFIX } from '@hoist/shared';
import type { DeploymentConfig } from '@hoist/shared';

export const HISTORY_SEPARATOR = '___';

export const DOCKER_INFO = 'docker info';

export function imageRef(config: Pick<DeploymentConfig, 'image' | 'tag'>): string {
  return `${config.image}:${config.tag}`;
}

export function backupName(config: Pick<DeploymentConfig, 'containerName'>): string {
  return `${config.containerName}${BACKUP_SUFFIX}`;
}

// ============================================================================
// Local
// ============================================================================

export function buildCommand(config: DeploymentConfig): string {
  const parts = ['docker build', `--platform ${config.platform}`];

  for (const [key, value] of Object.entries(config.buildArgs)) {
    parts.push(`--build-arg ${key}=${value}`);
  }

  parts.push(`-f ${config.dockerfile}`, `-t ${imageRef(config)}`, '.');
  return parts.join(' ');
}

/** `remote` is the bare ssh prefix; the compressed image is piped into it. */
export function transferCommand(config: DeploymentConfig, remote: string): string {
  return `docker save ${imageRef(config)} | gzip | ${remote} "docker load"`;
}

// ============================================================================
// Remote: container lifecycle
// ============================================================================

/**
 * `docker run` flags shared by deploy and rollback, ending with the image.
 */
export function runArgs(config: DeploymentConfig, image: string): string[] {
  const args = [
    '-d',
    '--name', config.containerName,
    '--restart', 'unless-stopped',
    '-p', `${config.hostPort}:${config.containerPort}`,
  ];

  if (config.network) {
    args.push('--network', config.network);
  }
  if (config.cpus) {
    args.push('--cpus', config.cpus);
  }
  if (config.memory) {
    args.push('--memory', config.memory);
  }
  for (const volume of config.volumes) {
    args.push('-v', volume);
  }
  if (config.envFile) {
    // env file was copied to the remote home directory
    args.push('--env-file', `~/${config.envFile}`);
  }

  args.push(image);
  return args;
}

export function restartCommand(config: DeploymentConfig): string {
  const name = config.containerName;
  return [
    `docker stop ${name} || true`,
    `docker rm ${name} || true`,
    `docker run ${runArgs(config, imageRef(config)).join(' ')}`,
  ].join(' && ');
}

export function statusCommand(config: DeploymentConfig): string {
  // anchored so <name>_backup never answers for <name>
  return `docker ps --filter name=^${config.containerName}$ --format '{{.Status}}'`;
}

// ============================================================================
// Remote: images
// ============================================================================

export function listReleasesCommand(config: DeploymentConfig): string {
  return `docker images '${config.image}' --format '{{.Repository}}:{{.Tag}}${HISTORY_SEPARATOR}{{.CreatedAt}}'`;
}

export function removeImageCommand(reference: string): string {
  return `docker rmi ${reference}`;
}

export function currentImageCommand(config: DeploymentConfig): string {
  return `docker inspect --format='{{.Config.Image}}' ${config.containerName}`;
}

// ============================================================================
// Remote: rollback swap
// ============================================================================

/** Stop the live container, keep it aside as the backup, start the older image. */
export function swapCommand(config: DeploymentConfig, previousImage: string): string {
  const name = config.containerName;
  return [
    `docker stop ${name}`,
    `docker rename ${name} ${backupName(config)}`,
    `docker run ${runArgs(config, previousImage).join(' ')}`,
  ].join(' && ');
}

export function restoreCommand(config: DeploymentConfig): string {
  const name = config.containerName;
  return [
    `docker stop ${name} || true`,
    `docker rm ${name} || true`,
    `docker rename ${backupName(config)} ${name}`,
    `docker start ${name}`,
  ].join(' && ');
}

export function removeBackupCommand(config: DeploymentConfig): string {
  return `docker rm ${backupName(config)}`;
}
