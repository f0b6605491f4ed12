import type { ControlPlane } from '../provisioning/types.js';
import type { JsonValue, ParameterDefinition } from '../types/index.js';

/**
 * State shared by every resolution within one invocation. A location chosen for one
 * location-bound parameter is reused for the next one instead of asking again.
 */
export interface ResolutionSession {
  location?: string;
}

/** Control-plane lookups the prompts need to build their option lists */
export type PromptServices = Pick<ControlPlane, 'listLocations' | 'listAiUsages' | 'listResourceGroups'>;

export interface PromptContext {
  session: ResolutionSession;
  subscriptionId?: string;
}

export interface ResolveRequest {
  /** Cache key: resolutions are reused per module path for the rest of the invocation */
  modulePath: string;
  parameters: ReadonlyMap<string, ParameterDefinition>;
  parameterFile: ReadonlyMap<string, JsonValue>;
  session: ResolutionSession;
  subscriptionId?: string;
}
