import type { ConfigStore, EnvironmentStore, ProjectConfig } from '../config/types.js';
import type { ResolutionSession } from '../parameters/types.js';
import type { DeploymentScope } from '../provisioning/types.js';
import type { DeploymentRecord, OutputParameter, ProposedChange, PurgeCandidate } from '../types/index.js';

// Orchestration-specific types

/** Everything one invocation works against */
export interface OrchestrationContext {
  projectRoot: string;
  project: ProjectConfig;
  environment: EnvironmentStore;
  config: ConfigStore;
  session: ResolutionSession;
}

export interface ProvisionOptions {
  /** Deploy even when the previous deployment has the same template and parameters */
  force?: boolean;
  signal?: AbortSignal;
}

export interface DeploymentMetadata {
  deploymentName: string;
  scope: DeploymentScope;
  timestamp: Date;
  duration?: number;
}

export interface ProvisionResult {
  status: 'deployed' | 'skipped';
  skippedReason?: 'DeploymentStateSkipped';
  deployment: DeploymentRecord;
  outputs: Record<string, OutputParameter>;
  metadata: DeploymentMetadata;
}

export interface PreviewResult {
  deploymentName: string;
  scope: DeploymentScope;
  changes: ProposedChange[];
}

export interface StateResult {
  deployment: DeploymentRecord;
  outputs: Record<string, OutputParameter>;
  resourceIds: string[];
}

export interface DestroyOptions {
  /** Delete without asking */
  force?: boolean;
  /** Purge soft-deleted resources without asking */
  purge?: boolean;
  signal?: AbortSignal;
}

export interface PurgeOutcome {
  candidate: PurgeCandidate;
  status: 'purged' | 'skipped';
}

export interface DestroyResult {
  deployment: DeploymentRecord;
  /** Groups that existed and were deleted */
  deletedResourceGroups: string[];
  purges: PurgeOutcome[];
  /** Environment keys that no longer describe live infrastructure */
  invalidatedEnvKeys: string[];
}
