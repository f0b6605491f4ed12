import type { Console } from '../console/types.js';
import { describeError } from '../errors/index.js';
import type { Logger } from '../logger.js';
import { ProvisioningState } from '../types/index.js';
import type { DeploymentTarget } from './deployment-target.js';
import { defaultSleep, type Sleep } from './retry.js';

export interface ProgressReporterOptions {
  initialDelayMs?: number;
  intervalMs?: number;
  sleep?: Sleep;
}

export const DEFAULT_PROGRESS_INITIAL_DELAY_MS = 3000;
export const DEFAULT_PROGRESS_INTERVAL_MS = 10000;

/**
 * Polls the operations of a running deployment in the background and prints each
 * resource once it finishes. A failed poll is logged and never fails the deployment.
 */
export class DeploymentProgressReporter {
  private readonly reported = new Set<string>();
  private readonly controller = new AbortController();
  private loop?: Promise<void>;

  constructor(
    private readonly target: DeploymentTarget,
    private readonly console: Console,
    private readonly logger: Logger,
    private readonly options: ProgressReporterOptions = {}
  ) {}

  start(): void {
    if (!this.loop) {
      this.loop = this.run(this.controller.signal);
    }
  }

  /** Cancels polling and waits for the loop to acknowledge */
  async stop(): Promise<void> {
    this.controller.abort();
    await this.loop;
  }

  /** One poll: prints every finished operation not printed before */
  async report(): Promise<void> {
    const operations = await this.target.listOperations();
    for (const operation of operations) {
      if (!operation.resourceType || !operation.resourceName || this.reported.has(operation.id)) {
        continue;
      }
      if (operation.provisioningState === ProvisioningState.Succeeded) {
        this.reported.add(operation.id);
        this.console.message(`  (✓) Done: ${operation.resourceType}: ${operation.resourceName}`);
      } else if (operation.provisioningState === ProvisioningState.Failed) {
        this.reported.add(operation.id);
        this.console.message(`  (x) Failed: ${operation.resourceType}: ${operation.resourceName}`);
      }
    }
  }

  private async run(signal: AbortSignal): Promise<void> {
    let delay = this.options.initialDelayMs ?? DEFAULT_PROGRESS_INITIAL_DELAY_MS;
    while (await this.pause(delay, signal)) {
      try {
        await this.report();
      } catch (error) {
        this.logger.debug(`Reporting deployment progress failed: ${describeError(error)}`);
      }
      delay = this.options.intervalMs ?? DEFAULT_PROGRESS_INTERVAL_MS;
    }
  }

  /** Resolves to false once polling has been cancelled */
  private async pause(ms: number, signal: AbortSignal): Promise<boolean> {
    if (signal.aborted) {
      return false;
    }
    const sleep = this.options.sleep ?? defaultSleep;
    try {
      await sleep(ms, signal);
    } catch (error) {
      if (!signal.aborted) {
        this.logger.debug(`Progress timer failed: ${describeError(error)}`);
      }
      return false;
    }
    return !signal.aborted;
  }
}
