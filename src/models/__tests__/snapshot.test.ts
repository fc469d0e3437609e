import { describe, expect, it } from 'vitest';

import {
  hasValue,
  isSnapshotComplete,
  parseFeedBody,
  toSnapshot,
} from '../snapshot';
import { asleepSnapshot, awakeSnapshot } from '../../__tests__/fixtures/snapshots';

describe('toSnapshot', () => {
  it('keeps scalar fields and drops nested values', () => {
    const snapshot = toSnapshot({
      vin: 'T1',
      battery_level: 80,
      polling: true,
      outside_temp: null,
      options: { seats: 5 },
      history: [1, 2],
    });

    expect(snapshot).toEqual({
      vin: 'T1',
      battery_level: 80,
      polling: true,
      outside_temp: null,
    });
  });

  it('returns a frozen snapshot', () => {
    const snapshot = toSnapshot({ vin: 'T1' });

    expect(Object.isFrozen(snapshot)).toBe(true);
  });
});

describe('parseFeedBody', () => {
  it('accepts a flat JSON object', () => {
    const result = parseFeedBody({ vin: 'T1', outside_temp: '15' });

    expect(result).toEqual({ ok: true, snapshot: { vin: 'T1', outside_temp: '15' } });
  });

  it('reports the result text of an error envelope', () => {
    const result = parseFeedBody({ response: { result: 'Invalid token' } });

    expect(result).toEqual({ ok: false, reason: 'rejected', result: 'Invalid token' });
  });

  it('reports an empty result when the envelope carries none', () => {
    expect(parseFeedBody({ response: {} })).toEqual({
      ok: false,
      reason: 'rejected',
      result: '',
    });
    expect(parseFeedBody({ response: null })).toEqual({
      ok: false,
      reason: 'rejected',
      result: '',
    });
  });

  it('rejects bodies that are not JSON objects', () => {
    expect(parseFeedBody([{ vin: 'T1' }])).toMatchObject({ ok: false, reason: 'malformed' });
    expect(parseFeedBody('vin=T1')).toMatchObject({ ok: false, reason: 'malformed' });
    expect(parseFeedBody(null)).toMatchObject({ ok: false, reason: 'malformed' });
  });
});

describe('hasValue', () => {
  it('treats null, undefined and empty strings as absent', () => {
    expect(hasValue(null)).toBe(false);
    expect(hasValue(undefined)).toBe(false);
    expect(hasValue('')).toBe(false);
    expect(hasValue('0')).toBe(true);
    expect(hasValue(0)).toBe(true);
    expect(hasValue(false)).toBe(true);
  });
});

describe('isSnapshotComplete', () => {
  it('is decided by the outside temperature field', () => {
    expect(isSnapshotComplete(awakeSnapshot)).toBe(true);
    expect(isSnapshotComplete(asleepSnapshot)).toBe(false);
    expect(isSnapshotComplete(toSnapshot({ vin: 'T1' }))).toBe(false);
    expect(isSnapshotComplete(toSnapshot({ outside_temp: 0 }))).toBe(true);
  });
});
