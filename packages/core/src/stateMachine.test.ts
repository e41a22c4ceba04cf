import { describe, it, expect } from 'vitest';
import { JobStateMachine, getNextStates, isTerminalState, isValidTransition } from './stateMachine.js';
import { StateTransitionError } from './errors/index.js';

describe('job lifecycle', () => {
  it('allows the forward transitions only', () => {
    expect(isValidTransition('QUEUED', 'RUNNING')).toBe(true);
    expect(isValidTransition('QUEUED', 'FAILED')).toBe(true);
    expect(isValidTransition('RUNNING', 'COMPLETE')).toBe(true);
    expect(isValidTransition('RUNNING', 'FAILED')).toBe(true);
    expect(isValidTransition('QUEUED', 'COMPLETE')).toBe(false);
    expect(isValidTransition('RUNNING', 'QUEUED')).toBe(false);
  });

  it('treats COMPLETE and FAILED as final', () => {
    expect(getNextStates('COMPLETE')).toEqual([]);
    expect(getNextStates('FAILED')).toEqual([]);
    expect(isTerminalState('COMPLETE')).toBe(true);
    expect(isTerminalState('RUNNING')).toBe(false);
  });

  it('records history and rejects leaving a terminal state', () => {
    const machine = new JobStateMachine('job-1');
    machine.transitionTo('RUNNING', 'started');
    machine.fail('upstream refused');

    expect(machine.getState()).toBe('FAILED');
    expect(machine.isTerminal()).toBe(true);
    expect(machine.getHistory().map((t) => `${t.from}->${t.to}`)).toEqual([
      'QUEUED->RUNNING',
      'RUNNING->FAILED',
    ]);
    expect(() => machine.transitionTo('RUNNING')).toThrow(StateTransitionError);
  });
});
