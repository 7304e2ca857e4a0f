import { describe, it, expect, afterEach, vi } from 'vitest';
import PollingManager from '../src/polling-manager.js';
import {
  GaugeConfigError,
  PollingTaskAlreadyExistsError,
  PollingTaskNotFoundError,
} from '../src/errors.js';

const sleep = (ms: number): Promise<void> => new Promise(resolve => setTimeout(resolve, ms));

describe('PollingManager', () => {
  let manager: PollingManager;

  afterEach(() => {
    manager.stopAll();
  });

  it('delivers results on every run', async () => {
    manager = new PollingManager();
    const values: number[] = [];
    let next = 0;
    manager.addTask({
      id: 'pressure',
      interval: 5,
      immediate: true,
      fn: async () => ++next,
      onData: value => values.push(value),
    });

    manager.startTask('pressure');

    await vi.waitFor(() => expect(values.length).toBeGreaterThanOrEqual(3));
    expect(values.slice(0, 3)).toEqual([1, 2, 3]);
    expect(manager.isTaskRunning('pressure')).toBe(true);
  });

  it('retries and then reports the failure once per run', async () => {
    manager = new PollingManager();
    const onError = vi.fn();
    const fn = vi.fn(async () => {
      throw new Error('no reply');
    });
    manager.addTask({ id: 'temp', interval: 10_000, immediate: true, maxRetries: 2, fn, onError });

    manager.startTask('temp');

    await vi.waitFor(() => expect(onError).toHaveBeenCalledTimes(1));
    expect(fn).toHaveBeenCalledTimes(3);
    expect(onError).toHaveBeenCalledWith(new Error('no reply'), 3);
    const stats = manager.getTaskStats('temp');
    expect(stats.totalRuns).toBe(1);
    expect(stats.failures).toBe(1);
    expect(stats.successes).toBe(0);
    expect(stats.lastError?.message).toBe('no reply');
  });

  it('counts a run that succeeds on a retry as a success', async () => {
    manager = new PollingManager();
    const onData = vi.fn();
    const onError = vi.fn();
    let calls = 0;
    manager.addTask({
      id: 'unit',
      interval: 10_000,
      immediate: true,
      maxRetries: 1,
      fn: async () => {
        calls++;
        if (calls === 1) throw new Error('timeout');
        return 'mbar';
      },
      onData,
      onError,
    });

    manager.startTask('unit');

    await vi.waitFor(() => expect(onData).toHaveBeenCalledWith('mbar'));
    expect(onError).not.toHaveBeenCalled();
    expect(manager.getTaskStats('unit').successes).toBe(1);
  });

  it('never runs two commands at once across tasks', async () => {
    manager = new PollingManager();
    let active = 0;
    let maxActive = 0;
    let runs = 0;
    const fn = async (): Promise<void> => {
      active++;
      maxActive = Math.max(maxActive, active);
      await sleep(5);
      active--;
      runs++;
    };
    manager.addTask({ id: 'a', interval: 1, immediate: true, fn });
    manager.addTask({ id: 'b', interval: 1, immediate: true, fn });

    manager.startAll();

    await vi.waitFor(() => expect(runs).toBeGreaterThanOrEqual(6));
    expect(maxActive).toBe(1);
  });

  it('serialises manual work with the tasks', async () => {
    manager = new PollingManager();
    expect(await manager.runExclusive(async () => 'done')).toBe('done');
  });

  it('stops and removes tasks', async () => {
    manager = new PollingManager();
    const fn = vi.fn(async () => 1);
    manager.addTask({ id: 'p', interval: 10_000, fn });

    manager.startTask('p');
    manager.stopTask('p');
    expect(manager.isTaskRunning('p')).toBe(false);

    manager.removeTask('p');
    expect(manager.hasTask('p')).toBe(false);
    expect(manager.taskIds).toEqual([]);
    expect(fn).not.toHaveBeenCalled();
  });

  it('validates task options', () => {
    manager = new PollingManager();
    const fn = async (): Promise<number> => 1;
    manager.addTask({ id: 'p', interval: 100, fn });

    expect(() => manager.addTask({ id: 'p', interval: 100, fn })).toThrow(
      PollingTaskAlreadyExistsError
    );
    expect(() => manager.addTask({ id: '', interval: 100, fn })).toThrow(GaugeConfigError);
    expect(() => manager.addTask({ id: 'q', interval: 0, fn })).toThrow(GaugeConfigError);
    expect(() => manager.addTask({ id: 'q', interval: 100, maxRetries: -1, fn })).toThrow(
      GaugeConfigError
    );
    expect(() => manager.startTask('missing')).toThrow(PollingTaskNotFoundError);
    expect(() => manager.getTaskStats('missing')).toThrow(
      'Polling task with id "missing" does not exist.'
    );
  });
});
