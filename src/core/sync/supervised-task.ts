/**
 * Supervised Task
 *
 * Handle around one long-running async job. A supervisor asks isRunning()
 * and calls restart() to start a fresh run only once the previous run has
 * exited; a run in progress is never replaced.
 */

import type pino from 'pino';

export type TaskBody = (signal: AbortSignal) => Promise<void>;

export class SupervisedTask {
  private run: Promise<void> | null = null;
  private controller: AbortController | null = null;
  private runs = 0;

  constructor(
    readonly name: string,
    private readonly body: TaskBody,
    private readonly logger: pino.Logger
  ) {}

  isRunning(): boolean {
    return this.run !== null;
  }

  /**
   * Number of runs started so far.
   */
  get runCount(): number {
    return this.runs;
  }

  /**
   * Start a new run if none is active. Returns true when a run was started.
   */
  restart(): boolean {
    if (this.run) {
      return false;
    }

    const controller = new AbortController();
    this.controller = controller;
    this.runs++;

    this.logger.debug({ task: this.name, run: this.runs }, 'Starting task');

    const run = this.body(controller.signal)
      .catch((error: unknown) => {
        this.logger.error({ err: error, task: this.name }, 'Task exited with an error');
      })
      .finally(() => {
        if (this.run === run) {
          this.run = null;
          this.controller = null;
        }
      });

    this.run = run;
    return true;
  }

  /**
   * Signal the current run to stop. Resolves once it has exited, or after
   * `graceMs` if it is parked on a wait that cannot observe the signal. A run
   * that outlives the grace period still counts as running, so restart()
   * cannot start a second one beside it.
   */
  async stop(graceMs = 1000): Promise<void> {
    const run = this.run;
    if (!run) {
      return;
    }

    this.controller?.abort();

    let timer: ReturnType<typeof setTimeout> | undefined;
    const grace = new Promise<void>((resolve) => {
      timer = setTimeout(resolve, graceMs);
    });

    await Promise.race([run, grace]);
    clearTimeout(timer);

    if (this.run === run) {
      this.logger.warn({ task: this.name, graceMs }, 'Task still running after stop');
    }
  }
}
