// ============================================================================
// Batch writer contract
// ============================================================================

import type { OperationRequestMessage, OperationResponseMessage, OperationStreamListener } from './messages.js';
import type { BatchPayloadUriOption } from './serialization.js';
import type { BatchWriterState } from './states.js';

/**
 * State-machine contract shared by batch encodings. Calls are strictly
 * sequential; no method may be invoked while another is still running.
 */
export interface BatchWriter extends OperationStreamListener {
  readonly state: BatchWriterState;

  startBatch(): void;
  startChangeset(): void;
  createOperationRequestMessage(
    method: string,
    uri: string,
    contentId?: string,
    uriOption?: BatchPayloadUriOption
  ): OperationRequestMessage;
  createOperationResponseMessage(contentId?: string): OperationResponseMessage;
  endChangeset(): void;
  endBatch(): void;

  flush(): void;
  flushAsync(): Promise<void>;

  /**
   * Always fails and leaves the writer in the `Error` state.
   */
  notifyInStreamError(): never;
}
