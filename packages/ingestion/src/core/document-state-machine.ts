import { DocumentState } from '@ledgerlens/model';

import { InvalidStateTransitionError } from '../errors/ingestion-error';

const { NEW, PARSED, SEGMENTED, EXTRACTED, CHUNKED, FILTERED, STORED } =
  DocumentState;
const { SKIPPED, FAILED, CANCELLED } = DocumentState;

/**
 * Allowed successors of each state. CHUNKED loops back to PARSED for the
 * next page; NEW may go straight to FILTERED for a document without pages.
 */
const TRANSITIONS: Readonly<Record<DocumentState, readonly DocumentState[]>> =
  {
    [NEW]: [PARSED, FILTERED, SKIPPED, FAILED, CANCELLED],
    [PARSED]: [SEGMENTED, FAILED, CANCELLED],
    [SEGMENTED]: [EXTRACTED, FAILED, CANCELLED],
    [EXTRACTED]: [CHUNKED, FAILED, CANCELLED],
    [CHUNKED]: [PARSED, FILTERED, FAILED, CANCELLED],
    [FILTERED]: [STORED, FAILED, CANCELLED],
    [STORED]: [],
    [SKIPPED]: [],
    [FAILED]: [],
    [CANCELLED]: [],
  };

export type StateChangeListener = (
  from: DocumentState,
  to: DocumentState,
) => void;

/**
 * DocumentStateMachine
 *
 * Lifecycle of one document. Illegal transitions throw
 * InvalidStateTransitionError and leave the state unchanged.
 */
export class DocumentStateMachine {
  private current: DocumentState = NEW;

  constructor(private readonly onStateChange?: StateChangeListener) {}

  get state(): DocumentState {
    return this.current;
  }

  get isTerminal(): boolean {
    return TRANSITIONS[this.current].length === 0;
  }

  canTransition(to: DocumentState): boolean {
    return TRANSITIONS[this.current].includes(to);
  }

  transition(to: DocumentState): void {
    if (!this.canTransition(to)) {
      throw new InvalidStateTransitionError(this.current, to);
    }
    const from = this.current;
    this.current = to;
    this.onStateChange?.(from, to);
  }
}
