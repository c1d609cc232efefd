/**
 * @hoist/shared - Deployment Config Zod Schema
 */

import { z } from 'zod';
import type { DeploymentConfig } from '../types/deployment.js';
import { ValidationError } from '../errors/index.js';

export const DEFAULTS = {
  image: 'app',
  tag: 'latest',
  platform: 'linux/amd64',
  dockerfile: 'Dockerfile',
  containerName: 'app',
  containerPort: '3000',
  hostPort: '3000',
} as const;

const portSchema = z.string().regex(/^\d{1,5}$/, 'must be a port number');

export const deploymentConfigSchema = z.object({
  // host and user may be empty here; the pipelines reject that before running anything
  host: z.string().default(''),
  user: z.string().default(''),
  sshKey: z.string().default(''),
  image: z.string().min(1).default(DEFAULTS.image),
  tag: z.string().min(1).default(DEFAULTS.tag),
  platform: z.string().min(1).default(DEFAULTS.platform),
  dockerfile: z.string().min(1).default(DEFAULTS.dockerfile),
  containerName: z.string().min(1).default(DEFAULTS.containerName),
  containerPort: portSchema.default(DEFAULTS.containerPort),
  hostPort: portSchema.default(DEFAULTS.hostPort),
  envFile: z.string().default(''),
  network: z.string().default(''),
  cpus: z.string().default(''),
  memory: z.string().default(''),
  volumes: z.array(z.string().min(1)).default([]),
  buildArgs: z.record(z.string().min(1), z.string()).default({}),
  rollback: z.boolean().default(false),
  version: z.string().default('0.0.0'),
});

export type DeploymentConfigInput = z.input<typeof deploymentConfigSchema>;

/**
 * Parse raw values into a frozen DeploymentConfig.
 * Throws ValidationError listing every offending field.
 */
export function parseDeploymentConfig(input: DeploymentConfigInput): DeploymentConfig {
  const parsed = deploymentConfigSchema.safeParse(input);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
    throw new ValidationError(`Invalid configuration: ${issues.join('; ')}`, { issues });
  }

  const { volumes, buildArgs, ...rest } = parsed.data;
  return Object.freeze({
    ...rest,
    volumes: Object.freeze([...volumes]),
    buildArgs: Object.freeze({ ...buildArgs }),
  });
}

/** Host and user are the only settings without a usable default. */
export function assertDeployTarget(config: Pick<DeploymentConfig, 'host' | 'user'>): void {
  if (config.host.trim() === '' || config.user.trim() === '') {
    throw new ValidationError('Missing required configuration: host and user must be provided', {
      host: config.host,
      user: config.user,
    });
  }
}
