import { EntryState } from '../../src/domain/artifact';
import { isRemovableState, transitionEntryState } from '../../src/engine/state-machine';

describe('Catalog entry state machine', () => {
  test('valid transition: pending -> published', () => {
    const result = transitionEntryState('ent_1', EntryState.Pending, EntryState.Published);
    expect(result.success).toBe(true);
    expect(result.newState).toBe(EntryState.Published);
  });

  test('valid transition: published -> deleted', () => {
    const result = transitionEntryState('ent_1', EntryState.Published, EntryState.Deleted);
    expect(result.success).toBe(true);
  });

  test('invalid transition: published -> pending', () => {
    const result = transitionEntryState('ent_1', EntryState.Published, EntryState.Pending);
    expect(result.success).toBe(false);
    expect(result.error?.typedError.code).toBe('REGISTRY.INVALID_STATE');
  });

  test('invalid transition: deleted -> published', () => {
    const result = transitionEntryState('ent_1', EntryState.Deleted, EntryState.Published);
    expect(result.success).toBe(false);
    expect(result.error?.message).toBe('Cannot transition catalog entry ent_1 from "deleted" to "published"');
  });

  test('only pending rows are aborted and only deleted rows are purged', () => {
    expect(isRemovableState(EntryState.Pending, 'abort')).toBe(true);
    expect(isRemovableState(EntryState.Published, 'abort')).toBe(false);
    expect(isRemovableState(EntryState.Deleted, 'purge')).toBe(true);
    expect(isRemovableState(EntryState.Published, 'purge')).toBe(false);
  });
});
