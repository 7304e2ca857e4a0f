// src/polling-manager.ts
import { Mutex } from 'async-mutex';
import { NOOP_LOGGER } from './logger.js';
import {
  GaugeConfigError,
  PollingManagerError,
  PollingTaskAlreadyExistsError,
  PollingTaskNotFoundError,
} from './errors.js';
import type {
  LoggerInstance,
  PollingManagerOptions,
  PollingTaskOptions,
  PollingTaskStats,
} from './types/gauge-types.js';

interface ManagedTask {
  readonly id: string;
  readonly stopped: boolean;
  readonly stats: PollingTaskStats;
  start(): void;
  stop(): void;
}

/**
 * TaskController drives one task's timer. A task never overlaps itself: the
 * next run is scheduled only after the current one settles.
 */
class TaskController<T> implements ManagedTask {
  public readonly id: string;
  public stopped: boolean = true;
  public stats: PollingTaskStats = {
    totalRuns: 0,
    successes: 0,
    failures: 0,
    lastError: null,
    lastRunTime: null,
  };

  private timerId: NodeJS.Timeout | null = null;
  private readonly maxRetries: number;

  constructor(
    private readonly options: PollingTaskOptions<T>,
    private readonly lock: Mutex,
    private readonly logger: LoggerInstance
  ) {
    this.id = options.id;
    this.maxRetries = options.maxRetries ?? 0;
  }

  start(): void {
    if (!this.stopped) return;
    this.stopped = false;
    this.logger.info('Task started', { task: this.id });
    this._scheduleNextRun(this.options.immediate ?? false);
  }

  stop(): void {
    if (this.stopped) return;
    this.stopped = true;
    if (this.timerId) {
      clearTimeout(this.timerId);
      this.timerId = null;
    }
    this.logger.info('Task stopped', { task: this.id });
  }

  private _scheduleNextRun(immediate: boolean): void {
    if (this.stopped) return;
    if (this.timerId) clearTimeout(this.timerId);
    this.timerId = setTimeout(
      () => {
        this.timerId = null;
        this.execute()
          .catch((err: unknown) => {
            this.logger.error('Task execution failed unexpectedly', {
              task: this.id,
              error: err instanceof Error ? err.message : String(err),
            });
          })
          .finally(() => this._scheduleNextRun(false));
      },
      immediate ? 0 : this.options.interval
    );
  }

  /**
   * One run: up to `maxRetries + 1` attempts, serialised with the other tasks
   * of the manager.
   */
  async execute(): Promise<void> {
    if (this.stopped) return;
    this.stats.totalRuns++;
    this.stats.lastRunTime = Date.now();

    let lastError: Error | null = null;
    for (let attempt = 1; attempt <= this.maxRetries + 1; attempt++) {
      if (this.stopped) return;
      let result: T;
      try {
        result = await this.lock.runExclusive(() => this.options.fn());
      } catch (err: unknown) {
        lastError = err instanceof Error ? err : new PollingManagerError(String(err));
        this.logger.debug(`Attempt #${attempt} failed: ${lastError.message}`, { task: this.id });
        continue;
      }
      this.stats.successes++;
      this.stats.lastError = null;
      this.options.onData?.(result);
      return;
    }

    if (lastError) {
      this.stats.failures++;
      this.stats.lastError = lastError;
      this.logger.warn(`Task failed after ${this.maxRetries + 1} attempt(s)`, {
        task: this.id,
        error: lastError.message,
      });
      this.options.onError?.(lastError, this.maxRetries + 1);
    }
  }
}

/**
 * Periodic reads on a caller-chosen interval. All tasks share one lock, so
 * only one command is in flight at a time across them.
 */
class PollingManager {
  private tasks: Map<string, ManagedTask> = new Map();
  private lock: Mutex = new Mutex();
  private logger: LoggerInstance;

  constructor(options: PollingManagerOptions = {}) {
    this.logger = options.logger ?? NOOP_LOGGER;
  }

  addTask<T>(options: PollingTaskOptions<T>): void {
    if (!options.id) {
      throw new GaugeConfigError('Polling task id is required');
    }
    if (!Number.isFinite(options.interval) || options.interval <= 0) {
      throw new GaugeConfigError(`Invalid polling interval: ${options.interval}`);
    }
    const { maxRetries } = options;
    if (maxRetries !== undefined && (!Number.isInteger(maxRetries) || maxRetries < 0)) {
      throw new GaugeConfigError(`Invalid maxRetries: ${maxRetries}`);
    }
    if (this.tasks.has(options.id)) {
      throw new PollingTaskAlreadyExistsError(options.id);
    }
    this.tasks.set(options.id, new TaskController<T>(options, this.lock, this.logger));
    this.logger.debug('Task added', { task: options.id, interval: options.interval });
  }

  removeTask(id: string): void {
    this._get(id).stop();
    this.tasks.delete(id);
  }

  startTask(id: string): void {
    this._get(id).start();
  }

  stopTask(id: string): void {
    this._get(id).stop();
  }

  startAll(): void {
    for (const task of this.tasks.values()) task.start();
  }

  stopAll(): void {
    for (const task of this.tasks.values()) task.stop();
  }

  hasTask(id: string): boolean {
    return this.tasks.has(id);
  }

  isTaskRunning(id: string): boolean {
    return !this._get(id).stopped;
  }

  getTaskStats(id: string): PollingTaskStats {
    return { ...this._get(id).stats };
  }

  get taskIds(): string[] {
    return [...this.tasks.keys()];
  }

  /**
   * Runs a function under the same lock the tasks use, e.g. a manual command.
   */
  runExclusive<T>(fn: () => Promise<T>): Promise<T> {
    return this.lock.runExclusive(fn);
  }

  private _get(id: string): ManagedTask {
    const task = this.tasks.get(id);
    if (!task) throw new PollingTaskNotFoundError(id);
    return task;
  }
}

export default PollingManager;
