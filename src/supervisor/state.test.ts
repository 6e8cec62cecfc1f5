import { describe, expect, test } from 'vitest';
import { SupervisorState, resolveTransition } from './state.js';

const { STOPPED, STARTING, RUNNING, STOPPING, RESTARTING } = SupervisorState;
const ALL = [STOPPED, STARTING, RUNNING, STOPPING, RESTARTING];

describe('resolveTransition', () => {
  test('ignores a request for the current state', () => {
    for (const state of ALL) {
      expect(resolveTransition(state, state)).toBe('ignore');
    }
  });

  test('rejects stopped -> running', () => {
    expect(resolveTransition(STOPPED, RUNNING)).toBe('reject');
  });

  test('commits the other transitions out of stopped', () => {
    expect(resolveTransition(STOPPED, STARTING)).toBe('commit');
    expect(resolveTransition(STOPPED, STOPPING)).toBe('commit');
    expect(resolveTransition(STOPPED, RESTARTING)).toBe('commit');
  });

  test('aborts when leaving running', () => {
    for (const state of [STOPPED, STARTING, STOPPING, RESTARTING]) {
      expect(resolveTransition(RUNNING, state)).toBe('abort');
    }
  });

  test('aborts starting -> stopped but commits the rest', () => {
    expect(resolveTransition(STARTING, STOPPED)).toBe('abort');
    expect(resolveTransition(STARTING, RUNNING)).toBe('commit');
    expect(resolveTransition(STARTING, STOPPING)).toBe('commit');
    expect(resolveTransition(STARTING, RESTARTING)).toBe('commit');
  });

  test('commits every change out of stopping and restarting', () => {
    for (const from of [STOPPING, RESTARTING]) {
      for (const to of ALL.filter((state) => state !== from)) {
        expect(resolveTransition(from, to)).toBe('commit');
      }
    }
  });
});
