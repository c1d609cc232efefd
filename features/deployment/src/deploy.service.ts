/**
 * DeployService - forward-only deployment
 *
 * validate -> docker_check -> ssh_check -> build -> transfer -> [env_copy]
 * -> deploy (restart, verify, prune old releases)
 *
 * The first failing stage ends the run; nothing is undone.
 */

import { assertDeployTarget, toHoistError } from '@hoist/shared';
import type { DeployResult, DeploymentConfig, PipelineStep } from '@hoist/shared';
import type { LoggerLike } from '@hoist/logger';
import type { SSHTransport } from '@hoist/ssh';
import type { DockerService } from './docker.service.js';
import { imageRef } from './commands.js';
import { runStep, skipStep } from './steps.js';

export class DeployService {
  constructor(
    private readonly config: DeploymentConfig,
    private readonly docker: DockerService,
    private readonly ssh: SSHTransport,
    private readonly logger: LoggerLike,
  ) {}

  async execute(): Promise<DeployResult> {
    const { config } = this;
    const image = imageRef(config);
    const steps: PipelineStep[] = [];
    const startTime = Date.now();
    let removedReleases: string[] = [];

    this.logger.info('Starting deployment process');

    try {
      await runStep(steps, 'validate', async () => assertDeployTarget(config),
        () => `Deploying ${image} to ${config.user}@${config.host}`);

      await runStep(steps, 'docker_check', () => this.docker.checkAvailability());
      await runStep(steps, 'ssh_check', () => this.ssh.check());
      await runStep(steps, 'build', () => this.docker.build(), () => `Built ${image}`);
      await runStep(steps, 'transfer', () => this.docker.transfer());

      if (config.envFile) {
        await runStep(steps, 'env_copy', () =>
          this.ssh.copyFile(config.envFile, 'Copying environment file to server'));
      } else {
        skipStep(steps, 'env_copy', 'No env file configured');
      }

      const outcome = await runStep(steps, 'deploy', () => this.docker.deploy(),
        ({ status, removedReleases: removed }) =>
          `${config.containerName}: ${status}; removed ${removed.length} old release(s)`);
      removedReleases = outcome.removedReleases;

      this.logger.info('Deployment completed successfully!');

      return {
        success: true,
        image,
        removedReleases,
        steps,
        duration: Date.now() - startTime,
      };
    } catch (error) {
      const failure = toHoistError(error);
      this.logger.error('Deployment failed', { detail: failure.message });

      return {
        success: false,
        image,
        removedReleases,
        steps,
        duration: Date.now() - startTime,
        error: failure,
      };
    }
  }
}
