export type {
  DeploymentConfig,
  RemoteTarget,
  CommandResult,
  RemoteImageRecord,
  RollbackPlan,
  StepStatus,
  PipelineStep,
  PipelineResult,
  DeployResult,
  RollbackResult,
} from './deployment.js';
