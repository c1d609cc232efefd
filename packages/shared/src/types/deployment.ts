/**
 * @hoist/shared - Deployment Types
 */

import type { HoistError } from '../errors/index.js';

// ============================================================================
// Configuration
// ============================================================================

/**
 * Everything one deploy or rollback run needs to know. Built once by the CLI
 * and frozen; pipelines never mutate it.
 */
export interface DeploymentConfig {
  readonly host: string;
  readonly user: string;
  /** Path to the SSH private key; empty means ssh picks its own default. */
  readonly sshKey: string;
  readonly image: string;
  readonly tag: string;
  readonly platform: string;
  readonly dockerfile: string;
  readonly containerName: string;
  readonly containerPort: string;
  readonly hostPort: string;
  /** Local env file, copied to the remote home directory under the same name. */
  readonly envFile: string;
  readonly network: string;
  readonly cpus: string;
  readonly memory: string;
  readonly volumes: readonly string[];
  readonly buildArgs: Readonly<Record<string, string>>;
  readonly rollback: boolean;
  readonly version: string;
}

/** The part of the config the SSH transport needs. */
export type RemoteTarget = Pick<DeploymentConfig, 'host' | 'user' | 'sshKey'>;

// ============================================================================
// Command Execution
// ============================================================================

export interface CommandResult {
  stdout: string;
  stderr: string;
}

// ============================================================================
// Image History
// ============================================================================

export interface RemoteImageRecord {
  /** `repository:tag`, as accepted by `docker run` and `docker rmi`. */
  reference: string;
  repository: string;
  tag: string;
  createdAt: Date;
}

export interface RollbackPlan {
  currentImage: string;
  previousImage: string;
}

// ============================================================================
// Pipeline Results
// ============================================================================

export type StepStatus = 'success' | 'failed' | 'skipped';

export interface PipelineStep {
  name: string;
  status: StepStatus;
  duration: number;
  output?: string;
  error?: string;
}

export interface PipelineResult {
  success: boolean;
  steps: PipelineStep[];
  duration: number;
  error?: HoistError;
}

export interface DeployResult extends PipelineResult {
  image: string;
  removedReleases: string[];
}

export interface RollbackResult extends PipelineResult {
  plan?: RollbackPlan;
}
