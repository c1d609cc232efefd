/**
 * DockerService Tests
 */

import {
  ContainerNotRunningError,
  DockerfileNotFoundError,
  ExecutionError,
} from '@hoist/shared';
import { SSHTransport } from '@hoist/ssh';
import { DockerService } from '../docker.service.js';
import {
  FakeRunner,
  createDockerfile,
  createLogger,
  releaseListing,
  testConfig,
} from './helpers.js';
import type { DeploymentConfigInput } from '@hoist/shared';

function setup(overrides: DeploymentConfigInput = {}) {
  const config = testConfig(overrides);
  const runner = new FakeRunner();
  const logger = createLogger();
  const docker = new DockerService(config, runner, new SSHTransport(config, runner), logger);
  return { runner, logger, docker };
}

describe('DockerService', () => {
  describe('checkAvailability', () => {
    it('should check the local daemon before the remote one', async () => {
      const { runner, docker } = setup();

      await docker.checkAvailability();

      expect(runner.calls).toEqual([
        { command: 'docker info', description: 'Checking local Docker installation' },
        { command: 'ssh deploy@example.com "docker info"', description: 'Checking remote Docker installation' },
      ]);
    });

    it('should name the host when the remote daemon is missing', async () => {
      const { runner, docker } = setup();
      runner.on('ssh deploy@example.com', new ExecutionError('Command failed with exit code 127', 127));

      const failure = docker.checkAvailability();

      await expect(failure).rejects.toThrow(
        'Remote Docker check failed - please ensure Docker is installed on example.com: Command failed with exit code 127',
      );
      await expect(failure).rejects.toMatchObject({ exitCode: 127 });
    });

    it('should stop at the local check', async () => {
      const { runner, docker } = setup();
      runner.on(/^docker info$/, new ExecutionError('Command failed with exit code 1', 1));

      await expect(docker.checkAvailability()).rejects.toThrow('Local Docker check failed');
      expect(runner.calls).toHaveLength(1);
    });
  });

  describe('build', () => {
    it('should refuse to build without a Dockerfile', async () => {
      const { runner, docker } = setup({ dockerfile: '/nonexistent/Dockerfile' });

      await expect(docker.build()).rejects.toThrow(DockerfileNotFoundError);
      expect(runner.calls).toHaveLength(0);
    });

    it('should run docker build when the Dockerfile exists', async () => {
      const dockerfile = createDockerfile();
      const { runner, docker } = setup({ dockerfile });

      await docker.build();

      expect(runner.calls).toEqual([{
        command: `docker build --platform linux/amd64 -f ${dockerfile} -t app:v6 .`,
        description: 'Building Docker image',
      }]);
    });
  });

  describe('verify', () => {
    it('should return the status line of a running container', async () => {
      const { runner, docker } = setup();
      runner.on('docker ps', 'Up 3 seconds\n');

      await expect(docker.verify()).resolves.toBe('Up 3 seconds');
    });

    it('should reject a container that is not up', async () => {
      const { runner, docker } = setup();
      runner.on('docker ps', 'Restarting (1) 2 seconds ago\n');

      await expect(docker.verify()).rejects.toThrow(ContainerNotRunningError);
      await expect(docker.verify()).rejects.toThrow('Container app failed to start properly');
    });

    it('should reject empty output', async () => {
      const { docker } = setup();

      await expect(docker.verify()).rejects.toThrow(ContainerNotRunningError);
    });
  });

  describe('cleanupOldReleases', () => {
    it('should remove releases beyond the newest five', async () => {
      const { runner, docker } = setup();
      runner.on('docker images', releaseListing(7));

      await expect(docker.cleanupOldReleases()).resolves.toEqual(['app:v2', 'app:v1']);
      expect(runner.calls.slice(1)).toEqual([
        { command: 'ssh deploy@example.com "docker rmi app:v2"', description: 'Removing old release v2' },
        { command: 'ssh deploy@example.com "docker rmi app:v1"', description: 'Removing old release v1' },
      ]);
    });

    it('should keep going when one removal fails', async () => {
      const { runner, logger, docker } = setup();
      runner
        .on('docker images', releaseListing(7))
        .on('docker rmi app:v2', new ExecutionError('Command failed with exit code 1', 1));

      await expect(docker.cleanupOldReleases()).resolves.toEqual(['app:v1']);
      expect(logger.warn).toHaveBeenCalledWith('Failed to remove old release v2', {
        detail: 'Command failed with exit code 1',
      });
    });

    it('should never pass ssh warnings to docker rmi', async () => {
      const { runner, docker } = setup();
      runner.on(
        'docker images',
        `Warning: Permanently added 'example.com' (ED25519) to the list of known hosts.\n${releaseListing(5)}`,
      );

      await expect(docker.cleanupOldReleases()).resolves.toEqual([]);
      expect(runner.commands.some(command => command.includes('docker rmi'))).toBe(false);
    });

    it('should remove nothing with five releases or fewer', async () => {
      const { runner, docker } = setup();
      runner.on('docker images', releaseListing(5));

      await expect(docker.cleanupOldReleases()).resolves.toEqual([]);
      expect(runner.calls).toHaveLength(1);
    });
  });

  describe('deploy', () => {
    it('should not fail when listing releases fails', async () => {
      const { runner, logger, docker } = setup();
      runner
        .on('docker ps', 'Up 1 second')
        .on('docker images', new ExecutionError('Command failed with exit code 255', 255));

      await expect(docker.deploy()).resolves.toEqual({ status: 'Up 1 second', removedReleases: [] });
      expect(logger.warn).toHaveBeenCalledWith('Failed to cleanup old releases', {
        detail: 'Command failed with exit code 255',
      });
    });

    it('should not clean up when the container is not running', async () => {
      const { runner, docker } = setup();

      await expect(docker.deploy()).rejects.toThrow(ContainerNotRunningError);
      expect(runner.commands.some(command => command.includes('docker images'))).toBe(false);
    });
  });

  it('should read the current image without surrounding whitespace', async () => {
    const { runner, docker } = setup();
    runner.on('docker inspect', 'app:v4\n');

    await expect(docker.currentImage()).resolves.toBe('app:v4');
  });
});
