import {describe, expect, test} from '@jest/globals';
import {toDeviceState} from './client';
import {buildUpdate} from './settingsPayload';

const current = toDeviceState({
  name: 'Hallway Canvas',
  sleep_duration: 172800,
  max_idle: -1,
  idx_wake_sens: 4,
  battery: 50,
});

describe('buildUpdate', () => {
  test('changes the name and carries the other settings', () => {
    expect(buildUpdate(current, {field: 'name', value: 'Study'})).toEqual({
      name: 'Study',
      sleep_duration: 172800,
      max_idle: -1,
      idx_wake_sens: 4,
    });
  });

  test('changes sleep duration', () => {
    expect(buildUpdate(current, {field: 'sleepDuration', value: 43200})).toEqual({
      name: 'Hallway Canvas',
      sleep_duration: 43200,
      max_idle: -1,
      idx_wake_sens: 4,
    });
  });

  test('changes max idle', () => {
    expect(buildUpdate(current, {field: 'maxIdle', value: 30})).toEqual({
      name: 'Hallway Canvas',
      sleep_duration: 172800,
      max_idle: 30,
      idx_wake_sens: 4,
    });
  });

  test('changes wake sensitivity', () => {
    expect(buildUpdate(current, {field: 'wakeSensitivity', value: 1})).toEqual({
      name: 'Hallway Canvas',
      sleep_duration: 172800,
      max_idle: -1,
      idx_wake_sens: 1,
    });
  });

  test('always carries exactly the four settings fields', () => {
    const payload = buildUpdate(current, {field: 'maxIdle', value: 600});
    expect(Object.keys(payload).sort()).toEqual(['idx_wake_sens', 'max_idle', 'name', 'sleep_duration']);
  });

  test('trims names', () => {
    expect(buildUpdate(current, {field: 'name', value: '  Study  '}).name).toEqual('Study');
  });

  test('rejects empty and overlong names', () => {
    expect(() => buildUpdate(current, {field: 'name', value: '   '})).toThrow(RangeError);
    expect(() => buildUpdate(current, {field: 'name', value: 'x'.repeat(51)})).toThrow(RangeError);
    expect(buildUpdate(current, {field: 'name', value: 'x'.repeat(50)}).name).toHaveLength(50);
  });
});
