/**
 * Supervisor Lifecycle State
 *
 * The supervisor's lifecycle states and the table deciding what a requested
 * transition does.
 */

export const SupervisorState = {
  STOPPED: 'stopped',
  STARTING: 'starting',
  RUNNING: 'running',
  STOPPING: 'stopping',
  RESTARTING: 'restarting',
} as const;
export type SupervisorState = (typeof SupervisorState)[keyof typeof SupervisorState];

/**
 * Outcome of a requested transition:
 * - ignore: already in the requested state
 * - reject: refused, the state stays as it is
 * - commit: apply the new state
 * - abort: apply the new state, then tear down the API client and watchers
 */
export type TransitionAction = 'ignore' | 'reject' | 'commit' | 'abort';

const { STOPPED, STARTING, RUNNING, STOPPING, RESTARTING } = SupervisorState;

/**
 * current state -> requested state -> action.
 *
 * stopped -> running is refused: when the service fails to start (say its
 * database is locked by another instance) the exit is seen first and a late
 * "ready" from the attempt can follow it.
 */
const TRANSITIONS: Record<SupervisorState, Record<SupervisorState, TransitionAction>> = {
  [STOPPED]: {
    [STOPPED]: 'ignore',
    [STARTING]: 'commit',
    [RUNNING]: 'reject',
    [STOPPING]: 'commit',
    [RESTARTING]: 'commit',
  },
  [STARTING]: {
    [STOPPED]: 'abort',
    [STARTING]: 'ignore',
    [RUNNING]: 'commit',
    [STOPPING]: 'commit',
    [RESTARTING]: 'commit',
  },
  [RUNNING]: {
    [STOPPED]: 'abort',
    [STARTING]: 'abort',
    [RUNNING]: 'ignore',
    [STOPPING]: 'abort',
    [RESTARTING]: 'abort',
  },
  [STOPPING]: {
    [STOPPED]: 'commit',
    [STARTING]: 'commit',
    [RUNNING]: 'commit',
    [STOPPING]: 'ignore',
    [RESTARTING]: 'commit',
  },
  [RESTARTING]: {
    [STOPPED]: 'commit',
    [STARTING]: 'commit',
    [RUNNING]: 'commit',
    [STOPPING]: 'commit',
    [RESTARTING]: 'ignore',
  },
};

export function resolveTransition(
  current: SupervisorState,
  requested: SupervisorState
): TransitionAction {
  return TRANSITIONS[current][requested];
}
