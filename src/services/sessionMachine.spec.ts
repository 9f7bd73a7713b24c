import { describe, expect, it } from 'vitest';
import { SessionStateMachine } from './sessionMachine.js';

describe('SessionStateMachine', () => {
  it('should start idle', () => {
    const machine = new SessionStateMachine();

    expect(machine.state).toBe('idle');
    expect(machine.can('START')).toBe(true);
    expect(machine.can('PAUSE')).toBe(false);
  });

  it('should walk through a full session', () => {
    const machine = new SessionStateMachine();
    const visited = [machine.state];

    for (const event of ['START', 'CONNECTED', 'PAUSE', 'RESUME', 'CONNECTED', 'STOP', 'STOPPED'] as const) {
      expect(machine.send(event)).toBe(true);
      visited.push(machine.state);
    }

    expect(visited).toEqual(['idle', 'connecting', 'recording', 'paused', 'connecting', 'recording', 'stopping', 'stopped']);
  });

  it('should refuse events the current state does not accept', () => {
    const machine = new SessionStateMachine();

    expect(machine.send('PAUSE')).toBe(false);
    expect(machine.send('RESUME')).toBe(false);
    expect(machine.send('STOP')).toBe(false);
    expect(machine.state).toBe('idle');
  });

  it('should not pause while connecting', () => {
    const machine = new SessionStateMachine();
    machine.send('START');

    expect(machine.can('PAUSE')).toBe(false);
    expect(machine.can('STOP')).toBe(true);
  });

  it('should recover from error by starting or stopping', () => {
    const machine = new SessionStateMachine();
    machine.send('START');
    machine.send('FAIL');
    expect(machine.state).toBe('error');

    expect(machine.can('START')).toBe(true);
    expect(machine.can('STOP')).toBe(true);
    expect(machine.can('PAUSE')).toBe(false);
  });

  it('should allow a new session after stopping', () => {
    const machine = new SessionStateMachine();
    for (const event of ['START', 'CONNECTED', 'STOP', 'STOPPED'] as const) {
      machine.send(event);
    }

    expect(machine.can('STOP')).toBe(false);
    expect(machine.send('START')).toBe(true);
    expect(machine.state).toBe('connecting');
  });
});
