import { describe, expect, test } from 'vitest';
import { RUN_EVENT_TYPES, SOLVE_EVENT_TYPES } from '../../src/events/RunEventTypes.js';

describe('RUN_EVENT_TYPES', () => {
  const all = [...Object.values(RUN_EVENT_TYPES), ...Object.values(SOLVE_EVENT_TYPES)];

  test('every value is unique across run and solve events', () => {
    expect(new Set(all).size).toBe(all.length);
  });

  test('every value is snake_case', () => {
    for (const value of all) {
      expect(value).toMatch(/^[a-z]+(?:_[a-z]+)*$/);
    }
  });

  test('keys are the upper-case form of their values', () => {
    for (const [key, value] of [...Object.entries(RUN_EVENT_TYPES), ...Object.entries(SOLVE_EVENT_TYPES)]) {
      expect(key).toBe(value.toUpperCase());
    }
  });
});
