import { describeError, getLogger } from './logger';
import type { ConnectionState } from './types';

export type TransitionCallback = (
  from: ConnectionState,
  to: ConnectionState,
) => void;

export interface StateMachine {
  getState(): ConnectionState;
  canTransition(to: ConnectionState): boolean;
  transition(to: ConnectionState): void;
  onTransition(callback: TransitionCallback): () => void;
}

/**
 * Valid state transitions:
 * - disconnected -> scanning | connecting
 * - scanning -> disconnected | connecting | error
 * - connecting -> connected | error | disconnected (cancelled)
 * - connected -> authenticating | error | disconnected
 * - authenticating -> authenticated | error | disconnected
 * - authenticated -> error | disconnected
 * - error -> disconnected
 */
const VALID_TRANSITIONS: Readonly<
  Record<ConnectionState, readonly ConnectionState[]>
> = {
  disconnected: ['scanning', 'connecting'],
  scanning: ['disconnected', 'connecting', 'error'],
  connecting: ['connected', 'error', 'disconnected'],
  connected: ['authenticating', 'error', 'disconnected'],
  authenticating: ['authenticated', 'error', 'disconnected'],
  authenticated: ['error', 'disconnected'],
  error: ['disconnected'],
};

/**
 * States in which a board link exists and must be torn down on failure.
 */
export const SESSION_STATES: readonly ConnectionState[] = [
  'connecting',
  'connected',
  'authenticating',
  'authenticated',
];

export function isValidTransition(
  from: ConnectionState,
  to: ConnectionState,
): boolean {
  return VALID_TRANSITIONS[from].includes(to);
}

/**
 * Creates a new state machine for connection management.
 * @param initialState The initial state (default: 'disconnected')
 */
export function createStateMachine(
  initialState: ConnectionState = 'disconnected',
): StateMachine {
  let state: ConnectionState = initialState;
  const callbacks = new Set<TransitionCallback>();

  function getState(): ConnectionState {
    return state;
  }

  function canTransition(to: ConnectionState): boolean {
    return isValidTransition(state, to);
  }

  function transition(to: ConnectionState): void {
    if (!canTransition(to)) {
      throw new Error(`Invalid state transition: ${state} -> ${to}`);
    }
    const from = state;
    state = to;

    for (const cb of callbacks) {
      try {
        cb(from, to);
      } catch (e) {
        getLogger().error(
          '[StateMachine] Transition callback error:',
          describeError(e),
        );
      }
    }
  }

  function onTransition(callback: TransitionCallback): () => void {
    callbacks.add(callback);
    return () => {
      callbacks.delete(callback);
    };
  }

  return {
    getState,
    canTransition,
    transition,
    onTransition,
  };
}
