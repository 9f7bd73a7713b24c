import { createActor, createMachine } from 'xstate';
import { SESSION_STATES, SessionState } from '../types/index.js';

export type SessionEventType = 'START' | 'CONNECTED' | 'PAUSE' | 'RESUME' | 'STOP' | 'STOPPED' | 'FAIL';

export const sessionMachine = createMachine({
  id: 'session',
  initial: 'idle',
  states: {
    idle: {
      on: { START: 'connecting', FAIL: 'error' }
    },
    connecting: {
      on: { CONNECTED: 'recording', STOP: 'stopping', FAIL: 'error' }
    },
    recording: {
      on: { PAUSE: 'paused', STOP: 'stopping', FAIL: 'error' }
    },
    paused: {
      on: { RESUME: 'connecting', STOP: 'stopping', FAIL: 'error' }
    },
    stopping: {
      on: { STOPPED: 'stopped', FAIL: 'error' }
    },
    stopped: {
      on: { START: 'connecting' }
    },
    error: {
      on: { START: 'connecting', STOP: 'stopping' }
    }
  }
});

function toSessionState(value: unknown): SessionState {
  const state = SESSION_STATES.find((candidate) => candidate === value);
  if (!state) {
    throw new Error(`Unexpected session machine state: ${JSON.stringify(value)}`);
  }
  return state;
}

/**
 * Thin wrapper around the machine actor; holds no session data
 */
export class SessionStateMachine {
  private readonly actor = createActor(sessionMachine);

  constructor() {
    this.actor.start();
  }

  get state(): SessionState {
    return toSessionState(this.actor.getSnapshot().value);
  }

  can(type: SessionEventType): boolean {
    return this.actor.getSnapshot().can({ type });
  }

  /**
   * Apply an event; returns false when the current state does not accept it
   */
  send(type: SessionEventType): boolean {
    if (!this.can(type)) {
      return false;
    }
    this.actor.send({ type });
    return true;
  }

  stop(): void {
    this.actor.stop();
  }
}
