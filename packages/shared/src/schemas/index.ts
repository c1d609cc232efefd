export {
  DEFAULTS,
  deploymentConfigSchema,
  parseDeploymentConfig,
  assertDeployTarget,
  type DeploymentConfigInput,
} from './config.js';
