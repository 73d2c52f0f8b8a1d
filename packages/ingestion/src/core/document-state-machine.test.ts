import { DocumentState } from '@ledgerlens/model';
import { describe, expect, test, vi } from 'vitest';

import { InvalidStateTransitionError } from '../errors/ingestion-error';
import { DocumentStateMachine } from './document-state-machine';

describe('DocumentStateMachine', () => {
  test('walks two pages through to STORED', () => {
    const onStateChange = vi.fn();
    const machine = new DocumentStateMachine(onStateChange);

    for (let page = 0; page < 2; page++) {
      machine.transition(DocumentState.PARSED);
      machine.transition(DocumentState.SEGMENTED);
      machine.transition(DocumentState.EXTRACTED);
      machine.transition(DocumentState.CHUNKED);
    }
    machine.transition(DocumentState.FILTERED);
    machine.transition(DocumentState.STORED);

    expect(machine.state).toBe(DocumentState.STORED);
    expect(machine.isTerminal).toBe(true);
    expect(onStateChange).toHaveBeenCalledTimes(10);
    expect(onStateChange).toHaveBeenNthCalledWith(
      5,
      DocumentState.CHUNKED,
      DocumentState.PARSED,
    );
  });

  test('starts in NEW and may be skipped', () => {
    const machine = new DocumentStateMachine();

    expect(machine.state).toBe(DocumentState.NEW);
    expect(machine.isTerminal).toBe(false);

    machine.transition(DocumentState.SKIPPED);

    expect(machine.isTerminal).toBe(true);
  });

  test('rejects skipping stages and keeps the state', () => {
    const machine = new DocumentStateMachine();
    machine.transition(DocumentState.PARSED);

    expect(() => machine.transition(DocumentState.CHUNKED)).toThrow(
      new InvalidStateTransitionError('PARSED', 'CHUNKED'),
    );
    expect(machine.state).toBe(DocumentState.PARSED);
  });

  test('allows failure or cancellation from any active state', () => {
    const failed = new DocumentStateMachine();
    failed.transition(DocumentState.PARSED);
    failed.transition(DocumentState.SEGMENTED);
    failed.transition(DocumentState.FAILED);

    const cancelled = new DocumentStateMachine();
    cancelled.transition(DocumentState.PARSED);
    cancelled.transition(DocumentState.SEGMENTED);
    cancelled.transition(DocumentState.EXTRACTED);
    cancelled.transition(DocumentState.CHUNKED);
    cancelled.transition(DocumentState.FILTERED);
    cancelled.transition(DocumentState.CANCELLED);

    expect(failed.state).toBe(DocumentState.FAILED);
    expect(cancelled.state).toBe(DocumentState.CANCELLED);
  });

  test('allows no transition out of a terminal state', () => {
    const machine = new DocumentStateMachine();
    machine.transition(DocumentState.FAILED);

    expect(machine.canTransition(DocumentState.PARSED)).toBe(false);
    expect(() => machine.transition(DocumentState.CANCELLED)).toThrow(
      'Invalid document state transition: FAILED -> CANCELLED',
    );
  });
});
