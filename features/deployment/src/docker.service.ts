/**
 * DockerService - one method per Docker phase of a run
 *
 * Local commands go straight to the runner, remote ones through the SSH
 * transport. Nothing about remote containers or images is cached: every
 * method asks the daemon again.
 */

import { existsSync } from 'node:fs';
import {
  ContainerNotRunningError,
  DockerfileNotFoundError,
  ExecutionError,
} from '@hoist/shared';
import type { DeploymentConfig, RemoteImageRecord } from '@hoist/shared';
import type { CommandRunner } from '@hoist/exec';
import type { LoggerLike } from '@hoist/logger';
import type { SSHTransport } from '@hoist/ssh';
import {
  DOCKER_INFO,
  buildCommand,
  currentImageCommand,
  listReleasesCommand,
  removeImageCommand,
  restartCommand,
  statusCommand,
  transferCommand,
} from './commands.js';
import { parseReleases, selectStaleReleases } from './history.js';
import type { DeployOutcome } from './types.js';

export class DockerService {
  constructor(
    private readonly config: DeploymentConfig,
    private readonly runner: CommandRunner,
    private readonly ssh: SSHTransport,
    private readonly logger: LoggerLike,
  ) {}

  /** Local daemon first, then the remote one. */
  async checkAvailability(): Promise<void> {
    try {
      await this.runner.execute(DOCKER_INFO, 'Checking local Docker installation');
    } catch (error) {
      throw availabilityError('local', 'Local Docker check failed', error);
    }

    try {
      await this.ssh.exec(DOCKER_INFO, 'Checking remote Docker installation');
    } catch (error) {
      throw availabilityError(
        'remote',
        `Remote Docker check failed - please ensure Docker is installed on ${this.ssh.host}`,
        error,
      );
    }
  }

  async build(): Promise<void> {
    if (!existsSync(this.config.dockerfile)) {
      throw new DockerfileNotFoundError(this.config.dockerfile);
    }
    await this.runner.execute(buildCommand(this.config), 'Building Docker image');
  }

  async transfer(): Promise<void> {
    await this.runner.execute(
      transferCommand(this.config, this.ssh.command),
      'Transferring Docker image to server',
    );
  }

  /**
   * Replace the remote container, then verify it and prune old releases.
   * Pruning problems are logged; they never fail the deploy.
   */
  async deploy(): Promise<DeployOutcome> {
    await this.ssh.exec(restartCommand(this.config), 'Restarting container on server');

    const status = await this.verify();

    let removedReleases: string[] = [];
    try {
      removedReleases = await this.cleanupOldReleases();
    } catch (error) {
      this.logger.warn('Failed to cleanup old releases', {
        detail: error instanceof Error ? error.message : String(error),
      });
    }

    return { status, removedReleases };
  }

  /**
   * Keep the newest RELEASES_TO_KEEP images of the configured repository.
   * Returns the references actually removed.
   */
  async cleanupOldReleases(): Promise<string[]> {
    const releases = await this.listReleases('Listing existing releases');
    const stale = selectStaleReleases(releases);
    const removed: string[] = [];

    for (const release of stale) {
      try {
        await this.ssh.exec(
          removeImageCommand(release.reference),
          `Removing old release ${release.tag}`,
        );
        removed.push(release.reference);
      } catch (error) {
        // keep going, one stuck image shouldn't block the rest
        this.logger.warn(`Failed to remove old release ${release.tag}`, {
          detail: error instanceof Error ? error.message : String(error),
        });
      }
    }

    return removed;
  }

  /** Resolves with the status line when the container is up. */
  async verify(description: string = 'Verifying container status'): Promise<string> {
    const result = await this.ssh.exec(statusCommand(this.config), description);
    const status = result.stdout.trim();

    if (!status.includes('Up')) {
      throw new ContainerNotRunningError(this.config.containerName, status);
    }
    return status;
  }

  async currentImage(): Promise<string> {
    const result = await this.ssh.exec(
      currentImageCommand(this.config),
      'Getting current container information',
    );
    return result.stdout.trim();
  }

  /** Releases of the configured image, newest first. */
  async listReleases(description: string = 'Getting image history'): Promise<RemoteImageRecord[]> {
    const result = await this.ssh.exec(listReleasesCommand(this.config), description);
    return parseReleases(result.stdout);
  }
}

function availabilityError(side: 'local' | 'remote', message: string, cause: unknown): ExecutionError {
  const reason = cause instanceof Error ? cause.message : String(cause);
  const exitCode = cause instanceof ExecutionError ? cause.exitCode : null;
  return new ExecutionError(`${message}: ${reason}`, exitCode, { side });
}
