import {describe, expect, test} from '@jest/globals';
import {MAX_IDLE, NEVER_SLEEP, SLEEP_DURATION, UnknownOptionError, WAKE_SENSITIVITY} from './options';

describe('option axes', () => {
  test('decodes every encoded label back to itself', () => {
    const axes = [
      {axis: SLEEP_DURATION, size: 6},
      {axis: MAX_IDLE, size: 8},
      {axis: WAKE_SENSITIVITY, size: 5},
    ];
    axes.forEach(({axis, size}) => {
      expect(axis.labels.length).toEqual(size);
      axis.labels.forEach(label => {
        expect(axis.decode(axis.encode(label))).toEqual(label);
      });
    });
  });

  test('labels keep their display order', () => {
    expect(SLEEP_DURATION.labels).toEqual(['12 hours', '1 day', '2 days', '3 days', '5 days', '7 days']);
    expect(WAKE_SENSITIVITY.labels).toEqual(['very low', 'low', 'medium', 'high', 'very high']);
  });

  test('encodes to device values', () => {
    expect(SLEEP_DURATION.encode('12 hours')).toEqual(43200);
    expect(SLEEP_DURATION.encode('7 days')).toEqual(604800);
    expect(MAX_IDLE.encode('2 minutes')).toEqual(120);
    expect(WAKE_SENSITIVITY.encode('very high')).toEqual(5);
  });

  test('never sleep is the -1 sentinel', () => {
    expect(MAX_IDLE.encode('never sleep')).toEqual(NEVER_SLEEP);
    expect(MAX_IDLE.decode(-1)).toEqual('never sleep');
  });

  test('unknown device values decode to the axis default', () => {
    expect(SLEEP_DURATION.decode(1234)).toEqual('1 day');
    expect(MAX_IDLE.decode(45)).toEqual('5 minutes');
    expect(WAKE_SENSITIVITY.decode(9)).toEqual('medium');
  });

  test('decoding is an exact match', () => {
    expect(SLEEP_DURATION.decode(43201)).toEqual('1 day');
    expect(MAX_IDLE.decode(11)).toEqual('5 minutes');
  });

  test('unknown labels are rejected', () => {
    expect(() => SLEEP_DURATION.encode('4 days')).toThrow(UnknownOptionError);
    expect(() => MAX_IDLE.encode('Never Sleep')).toThrow('Invalid max idle option: Never Sleep');
    expect(() => WAKE_SENSITIVITY.encode('')).toThrow(UnknownOptionError);
  });

  test('has checks membership', () => {
    expect(MAX_IDLE.has('10 minutes')).toBe(true);
    expect(MAX_IDLE.has('20 minutes')).toBe(false);
  });
});
