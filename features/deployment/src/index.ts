/**
 * @hoist/deployment
 */

import type { DeploymentConfig } from '@hoist/shared';
import type { CommandRunner } from '@hoist/exec';
import type { LoggerLike } from '@hoist/logger';
import { SSHTransport } from '@hoist/ssh';
import { DockerService } from './docker.service.js';
import { DeployService } from './deploy.service.js';
import { RollbackService } from './rollback.service.js';

export { DockerService, DeployService, RollbackService };
export * from './commands.js';
export {
  parseCreatedAt,
  parseReleases,
  normalizeReference,
  selectStaleReleases,
  resolvePreviousImage,
} from './history.js';
export type { DeployOutcome } from './types.js';

export interface DeploymentServices {
  docker: DockerService;
  deploy: DeployService;
  rollback: RollbackService;
}

/** Wire the services for one run around a single runner and logger. */
export function createDeploymentServices(
  config: DeploymentConfig,
  runner: CommandRunner,
  logger: LoggerLike,
): DeploymentServices {
  const ssh = new SSHTransport(config, runner);
  const docker = new DockerService(config, runner, ssh, logger);

  return {
    docker,
    deploy: new DeployService(config, docker, ssh, logger),
    rollback: new RollbackService(config, docker, ssh, logger),
  };
}
