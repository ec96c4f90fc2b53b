// ============================================================================
// Batch writer states and transition rules
// ============================================================================
//
// Shared by every batch encoding: the multipart/mixed writer calls these before
// it touches the output.

import { throwError } from './errors.js';

export type BatchWriterState =
  | 'Start'
  | 'BatchStarted'
  | 'ChangesetStarted'
  | 'OperationCreated'
  | 'OperationStreamRequested'
  | 'OperationStreamDisposed'
  | 'ChangesetCompleted'
  | 'BatchCompleted'
  | 'Error';

const TRANSITIONS: Record<BatchWriterState, readonly BatchWriterState[]> = {
  Start: ['BatchStarted'],
  BatchStarted: ['ChangesetStarted', 'OperationCreated', 'BatchCompleted'],
  ChangesetStarted: ['OperationCreated', 'ChangesetCompleted'],
  OperationCreated: [
    'OperationCreated',
    'OperationStreamRequested',
    'ChangesetStarted',
    'ChangesetCompleted',
    'BatchCompleted',
  ],
  OperationStreamRequested: ['OperationStreamDisposed'],
  OperationStreamDisposed: ['OperationCreated', 'ChangesetStarted', 'ChangesetCompleted', 'BatchCompleted'],
  ChangesetCompleted: ['ChangesetStarted', 'OperationCreated', 'BatchCompleted'],
  BatchCompleted: [],
  Error: [],
};

export function isTerminalState(state: BatchWriterState): boolean {
  return state === 'BatchCompleted' || state === 'Error';
}

export function canTransition(from: BatchWriterState, to: BatchWriterState): boolean {
  // Error is reachable from anywhere but never left.
  if (to === 'Error') return from !== 'Error';
  return TRANSITIONS[from].includes(to);
}

/**
 * Throws `InvalidStateTransition` when `to` is not reachable from `from`.
 */
export function validateTransition(from: BatchWriterState, to: BatchWriterState): void {
  if (!canTransition(from, to)) {
    throwError('InvalidStateTransition', `Cannot transition from '${from}' to '${to}'`, { from, to });
  }
}

/**
 * Changeset nesting rules for encodings that scope changesets explicitly.
 */
export function validateChangesetScope(to: BatchWriterState, changesetActive: boolean): void {
  if (to === 'ChangesetStarted' && changesetActive) {
    throwError(
      'CannotStartChangesetWithActiveChangeset',
      'Cannot start a changeset while another changeset is active'
    );
  }
  if (to === 'ChangesetCompleted' && !changesetActive) {
    throwError(
      'CannotCompleteChangesetWithoutActiveChangeset',
      'Cannot complete a changeset when no changeset is active'
    );
  }
  if (to === 'BatchCompleted' && changesetActive) {
    throwError('CannotCompleteBatchWithActiveChangeset', 'Cannot complete a batch while a changeset is active');
  }
}
