/**
 * Deployment feature types
 */

export interface DeployOutcome {
  /** `docker ps` status line of the new container, e.g. "Up 3 seconds". */
  status: string;
  removedReleases: string[];
}
