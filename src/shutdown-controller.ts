import type { LogSink } from './types.js';

export type CleanupStep = () => Promise<void> | void;

interface NamedStep {
  name: string;
  step: CleanupStep;
}

/**
 * Cleanup run once before the process exits: telemetry flush, transport close.
 * Steps run newest first; a failing step is reported and the rest still run.
 */
export class ShutdownController {
  private readonly steps: NamedStep[] = [];
  private pending?: Promise<void>;

  public register(name: string, step: CleanupStep): void {
    this.steps.push({ name, step });
  }

  public shutdown(opts: { logger?: LogSink } = {}): Promise<void> {
    this.pending ??= this.runSteps(opts.logger);
    return this.pending;
  }

  private async runSteps(logger: LogSink | undefined): Promise<void> {
    const ordered = [...this.steps].reverse();
    // eslint-disable-next-line functional/no-loop-statements -- steps are awaited one by one
    for (const { name, step } of ordered) {
      try {
        await step();
      } catch (error) {
        logger?.({
          timestamp: Date.now(),
          severity: 'WRN',
          component: 'runner',
          direction: 'response',
          remoteIdentifier: 'runner:shutdown',
          fatal: false,
          message: `cleanup '${name}' failed: ${error instanceof Error ? error.message : String(error)}`,
        });
      }
    }
  }
}
