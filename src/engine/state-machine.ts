/**
 * Catalog entry state machine.
 *
 * Enforces valid entry state transitions, producing typed errors on
 * invalid ones. The catalog consults it before every state-changing write.
 */

import { EntryState, VALID_ENTRY_TRANSITIONS } from '../domain/artifact';
import { RegistryError, invalidStateError } from '../domain/errors';

/** Result of a state transition attempt. */
export interface TransitionResult<S> {
  success: boolean;
  newState?: S;
  error?: RegistryError;
}

/** Attempt an entry state transition. */
export function transitionEntryState(
  entryId: string,
  current: EntryState,
  target: EntryState,
): TransitionResult<EntryState> {
  const validTargets = VALID_ENTRY_TRANSITIONS[current];
  if (!validTargets.includes(target)) {
    return { success: false, error: invalidStateError(entryId, current, target) };
  }
  return { success: true, newState: target };
}

/** Whether a row in this state may be removed outright (abort or purge). */
export function isRemovableState(state: EntryState, via: 'abort' | 'purge'): boolean {
  return via === 'abort' ? state === EntryState.Pending : state === EntryState.Deleted;
}
