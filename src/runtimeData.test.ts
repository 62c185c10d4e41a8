import {describe, expect, test} from '@jest/globals';
import {Client, toDeviceState} from './canvas/client';
import {RuntimeData} from './runtimeData';

const newRuntime = (logLimit?: number) => new RuntimeData('http://127.0.0.1:1', new Client('http://127.0.0.1:1'), logLimit);

describe('RuntimeData', () => {
  test('starts empty', () => {
    const runtime = newRuntime();
    expect(runtime.get()).toBe(null);
    expect(runtime.logs).toEqual([]);
  });

  test('replaces the snapshot whole', () => {
    const runtime = newRuntime();
    const first = toDeviceState({name: 'A', battery: 10});
    const second = toDeviceState({name: 'B', battery: 90});

    runtime.set(first);
    const seen = runtime.get();
    runtime.set(second);

    expect(seen).toBe(first);
    expect(seen?.name).toEqual('A');
    expect(seen?.battery).toEqual(10);
    expect(runtime.get()).toBe(second);
  });

  test('stored snapshots cannot be modified', () => {
    const runtime = newRuntime();
    runtime.set({...toDeviceState({battery: 10})});
    const snapshot = runtime.get();
    expect(Object.isFrozen(snapshot)).toBe(true);
  });

  test('clear empties the cache', () => {
    const runtime = newRuntime();
    runtime.set(toDeviceState({}));
    runtime.clear();
    expect(runtime.get()).toBe(null);
  });

  test('keeps logs in insertion order', () => {
    const runtime = newRuntime();
    runtime.appendLog('info', 'first');
    runtime.appendLog('warning', 'second');
    runtime.appendLog('error', 'third');
    expect(runtime.logs.map(entry => entry.message)).toEqual(['first', 'second', 'third']);
    expect(runtime.logs.map(entry => entry.level)).toEqual(['info', 'warning', 'error']);
  });

  test('drops the oldest logs past the limit', () => {
    const runtime = newRuntime(3);
    ['a', 'b', 'c', 'd', 'e'].forEach(message => runtime.appendLog('info', message));
    expect(runtime.logs.map(entry => entry.message)).toEqual(['c', 'd', 'e']);
  });

  test('logs are returned as a copy', () => {
    const runtime = newRuntime();
    runtime.appendLog('info', 'first');
    runtime.logs.pop();
    expect(runtime.logs.length).toEqual(1);
  });

  test('dispose drops the snapshot', () => {
    const runtime = newRuntime();
    runtime.set(toDeviceState({}));
    runtime.dispose();
    expect(runtime.get()).toBe(null);
  });
});
