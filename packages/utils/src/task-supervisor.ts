/**
 * Task Supervisor
 *
 * Runs named cooperative tasks on the event loop and owns the one shutdown
 * signal they all observe. Every termination trigger (OS signal, task fault,
 * explicit request) goes through `requestShutdown`, which aborts the shared
 * signal exactly once.
 */

import { EventEmitter, once } from 'events';
import { Logger, describeError } from './logger';
import { waitForAbort } from './timing';

export type SupervisedTask = (signal: AbortSignal) => Promise<void>;

export type ShutdownReason =
  | { kind: 'signal'; signal: NodeJS.Signals }
  | { kind: 'task_fault'; task: string; error: UnhandledTaskFault }
  | { kind: 'requested'; source: string };

export interface ShutdownReport {
  reason: ShutdownReason;
  faults: UnhandledTaskFault[];
  /** True when tasks were still running after `shutdownTimeoutMs` */
  timedOut: boolean;
  pendingTasks: string[];
}

export interface TaskSupervisorOptions {
  shutdownTimeoutMs?: number;
}

/**
 * Any exception escaping a supervised task
 */
export class UnhandledTaskFault extends Error {
  readonly task: string;

  constructor(task: string, cause: unknown) {
    super(`Task ${task} failed: ${describeError(cause)}`, { cause });
    this.name = 'UnhandledTaskFault';
    this.task = task;
  }
}

interface TaskEntry {
  name: string;
  done: boolean;
  settled: Promise<void>;
}

const WATCHDOG_TASK = 'error-watchdog';

export class TaskSupervisor {
  private readonly controller = new AbortController();
  private readonly tasks = new Map<string, TaskEntry>();
  private readonly faults: UnhandledTaskFault[] = [];
  private readonly faultEvents = new EventEmitter();
  private readonly logger: Logger;
  private readonly shutdownTimeoutMs: number;
  private reason: ShutdownReason | null = null;
  private signalHandlers: Array<{ signal: NodeJS.Signals; handler: () => void }> = [];

  constructor(logger: Logger, options: TaskSupervisorOptions = {}) {
    this.logger = logger;
    this.shutdownTimeoutMs = options.shutdownTimeoutMs ?? 30000;
    this.addTask(WATCHDOG_TASK, (signal) => this.watchForFaults(signal));
  }

  /**
   * Shared shutdown signal, aborted once by `requestShutdown`
   */
  get signal(): AbortSignal {
    return this.controller.signal;
  }

  get isShuttingDown(): boolean {
    return this.controller.signal.aborted;
  }

  get shutdownReason(): ShutdownReason | null {
    return this.reason;
  }

  /**
   * Start a named task. Its rejection is reported to the error watchdog.
   */
  addTask(name: string, task: SupervisedTask): void {
    if (this.tasks.has(name)) {
      throw new Error(`Task already registered: ${name}`);
    }

    const entry: TaskEntry = { name, done: false, settled: Promise.resolve() };
    entry.settled = Promise.resolve()
      .then(() => task(this.controller.signal))
      .then(
        () => {
          this.logger.info(`Task finished: ${name}`);
        },
        (error: unknown) => {
          this.reportFault(new UnhandledTaskFault(name, error));
        }
      )
      .finally(() => {
        entry.done = true;
      });

    this.tasks.set(name, entry);
    this.logger.info(`Added task: ${name}`);
  }

  /**
   * The single convergent shutdown path. Only the first call has effect.
   */
  requestShutdown(reason: ShutdownReason): void {
    if (this.reason) {
      this.logger.debug('Shutdown already in progress, ignoring request', { reason: reason.kind });
      return;
    }

    this.reason = reason;
    this.logger.info('Initiating shutdown', { reason: describeReason(reason) });
    this.controller.abort(reason);
  }

  /**
   * Route OS termination signals to `requestShutdown`
   */
  installSignalHandlers(signals: NodeJS.Signals[] = ['SIGINT', 'SIGTERM']): void {
    for (const signal of signals) {
      const handler = (): void => {
        this.logger.info(`Received ${signal} signal`);
        this.requestShutdown({ kind: 'signal', signal });
      };
      process.on(signal, handler);
      this.signalHandlers.push({ signal, handler });
    }
  }

  /**
   * Wait for shutdown, then for every task to settle within the timeout
   */
  async run(): Promise<ShutdownReport> {
    try {
      if (!this.isShuttingDown) {
        await waitForAbort(this.controller.signal);
      }

      const timedOut = !(await this.waitForTasks());
      const pendingTasks = [...this.tasks.values()].filter((t) => !t.done).map((t) => t.name);

      if (timedOut) {
        this.logger.error(`Shutdown timeout exceeded (${this.shutdownTimeoutMs}ms)`, undefined, { pendingTasks });
      } else {
        this.logger.info('Shutdown complete', { faults: this.faults.length });
      }

      return {
        reason: this.reason ?? { kind: 'requested', source: 'unknown' },
        faults: [...this.faults],
        timedOut,
        pendingTasks
      };
    } finally {
      this.removeSignalHandlers();
    }
  }

  getTaskNames(): string[] {
    return [...this.tasks.keys()];
  }

  getFaults(): UnhandledTaskFault[] {
    return [...this.faults];
  }

  private reportFault(fault: UnhandledTaskFault): void {
    this.faults.push(fault);
    this.logger.error(`Task ${fault.task} failed`, fault.cause);
    this.faultEvents.emit('fault', fault);
  }

  /**
   * Error watchdog: suspends until a task faults or shutdown begins
   */
  private async watchForFaults(signal: AbortSignal): Promise<void> {
    const earlier = this.faults[0];
    if (earlier) {
      this.requestShutdown({ kind: 'task_fault', task: earlier.task, error: earlier });
      return;
    }

    let fault: unknown;
    try {
      [fault] = await once(this.faultEvents, 'fault', { signal });
    } catch (error) {
      if (signal.aborted) {
        return;
      }
      throw error;
    }

    if (fault instanceof UnhandledTaskFault) {
      this.requestShutdown({ kind: 'task_fault', task: fault.task, error: fault });
    }
  }

  private async waitForTasks(): Promise<boolean> {
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<false>((resolve) => {
      timer = setTimeout(() => resolve(false), this.shutdownTimeoutMs);
    });

    try {
      const settled = Promise.all([...this.tasks.values()].map((t) => t.settled)).then(() => true);
      return await Promise.race([settled, timeout]);
    } finally {
      clearTimeout(timer);
    }
  }

  private removeSignalHandlers(): void {
    for (const { signal, handler } of this.signalHandlers) {
      process.removeListener(signal, handler);
    }
    this.signalHandlers = [];
  }
}

export function describeReason(reason: ShutdownReason): string {
  switch (reason.kind) {
    case 'signal':
      return `signal ${reason.signal}`;
    case 'task_fault':
      return `task ${reason.task} faulted: ${describeError(reason.error.cause)}`;
    case 'requested':
      return `requested by ${reason.source}`;
  }
}
