/**
 * RollbackService - go back to the image deployed before the current one
 *
 * validate -> ssh_check -> current_image -> history -> resolve_previous
 * -> swap (stop, rename to <name>_backup, run previous) -> verify -> remove_backup
 *
 * The renamed container is the backup. If the swap or the verification fails
 * the backup is put back under the live name, and the result says whether
 * that worked.
 */

import {
  RollbackRestoreFailedError,
  RollbackRestoredError,
  assertDeployTarget,
  toHoistError,
} from '@hoist/shared';
import type {
  DeploymentConfig,
  HoistError,
  PipelineStep,
  RollbackPlan,
  RollbackResult,
} from '@hoist/shared';
import type { LoggerLike } from '@hoist/logger';
import type { SSHTransport } from '@hoist/ssh';
import type { DockerService } from './docker.service.js';
import { backupName, removeBackupCommand, restoreCommand, swapCommand } from './commands.js';
import { resolvePreviousImage } from './history.js';
import { runStep } from './steps.js';

export class RollbackService {
  constructor(
    private readonly config: DeploymentConfig,
    private readonly docker: DockerService,
    private readonly ssh: SSHTransport,
    private readonly logger: LoggerLike,
  ) {}

  async execute(): Promise<RollbackResult> {
    const { config } = this;
    const steps: PipelineStep[] = [];
    const startTime = Date.now();
    let plan: RollbackPlan | undefined;

    this.logger.info('Starting rollback process...');

    try {
      await runStep(steps, 'validate', async () => assertDeployTarget(config));
      await runStep(steps, 'ssh_check', () => this.ssh.check());

      const currentImage = await runStep(steps, 'current_image', () => this.docker.currentImage(),
        image => `Current image: ${image}`);

      const releases = await runStep(steps, 'history', () => this.docker.listReleases(),
        records => `${records.length} release(s) of ${config.image}`);

      const resolved = await runStep(steps, 'resolve_previous',
        async () => resolvePreviousImage(releases, currentImage),
        ({ previousImage }) => `Previous image: ${previousImage}`);
      plan = resolved;

      this.logger.info(`Found previous version: ${resolved.previousImage}`);

      await this.swap(steps, resolved);
      await this.removeBackup(steps);

      this.logger.info('Rollback completed successfully!');

      return { success: true, plan, steps, duration: Date.now() - startTime };
    } catch (error) {
      const failure = toHoistError(error);
      this.logger.error('Rollback failed', { detail: failure.message });

      return { success: false, plan, steps, duration: Date.now() - startTime, error: failure };
    }
  }

  // ===========================================================================
  // Private Helpers
  // ===========================================================================

  private async swap(steps: PipelineStep[], plan: RollbackPlan): Promise<void> {
    try {
      await runStep(steps, 'swap', () =>
        this.ssh.exec(swapCommand(this.config, plan.previousImage), 'Rolling back to previous version'),
        () => `${this.config.containerName} now runs ${plan.previousImage}`);

      await runStep(steps, 'verify', () =>
        this.docker.verify('Verifying rollback container status'));
    } catch (error) {
      throw await this.restore(steps, toHoistError(error));
    }
  }

  /**
   * Put the backup back under the live name. Returns the error the run ends
   * with, which tells the operator whether the old container is running again.
   */
  private async restore(steps: PipelineStep[], original: HoistError): Promise<HoistError> {
    this.logger.warn(`Rollback failed, restoring ${backupName(this.config)}`, {
      detail: original.message,
    });

    try {
      await runStep(steps, 'restore', () =>
        this.ssh.exec(restoreCommand(this.config), 'Restoring previous version after failed rollback'));
      return new RollbackRestoredError(original);
    } catch (error) {
      return new RollbackRestoreFailedError(original, toHoistError(error));
    }
  }

  private async removeBackup(steps: PipelineStep[]): Promise<void> {
    try {
      await runStep(steps, 'remove_backup', () =>
        this.ssh.exec(removeBackupCommand(this.config), 'Cleaning up backup container'));
    } catch (error) {
      this.logger.warn(`Failed to remove ${backupName(this.config)}`, {
        detail: error instanceof Error ? error.message : String(error),
      });
    }
  }
}
