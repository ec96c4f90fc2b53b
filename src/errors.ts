// ============================================================================
// Batch writer errors
// ============================================================================

export type BatchErrorReason =
  | 'InvalidStateTransition'
  | 'CannotStartChangesetWithActiveChangeset'
  | 'CannotCompleteChangesetWithoutActiveChangeset'
  | 'CannotCompleteBatchWithActiveChangeset'
  | 'InvalidHttpMethodForChangesetRequest'
  | 'MissingContentIdInChangeset'
  | 'InStreamErrorNotSupported'
  | 'InvalidHttpMethod'
  | 'DuplicateContentId'
  | 'ContentIdReferenceNotFound'
  | 'CannotCreateRequestWhenWritingResponse'
  | 'CannotCreateResponseWhenWritingRequest'
  | 'MaxBatchSizeExceeded'
  | 'MaxChangesetSizeExceeded'
  | 'SyncCallOnAsyncWriter'
  | 'AsyncCallOnSyncWriter'
  | 'FlushInStreamRequestedState'
  | 'OperationMessageCompleted'
  | 'OperationStreamAlreadyRequested'
  | 'InvalidWriterSettings';

export type BatchErrorDetails = {
  from?: string;
  to?: string;
  method?: string;
  contentId?: string;
  uri?: string;
  limit?: number;
  issues?: string[];
  [key: string]: unknown;
};

const BATCH_ERROR_BRAND = Symbol.for('odata-multipart-batch.error');

/**
 * The single error kind raised for invalid batch operations.
 * `reason` tells the violations apart.
 */
export class BatchOperationError extends Error {
  readonly reason: BatchErrorReason;
  readonly details?: BatchErrorDetails;
  readonly [BATCH_ERROR_BRAND] = true;

  constructor(reason: BatchErrorReason, message: string, details?: BatchErrorDetails) {
    super(message);
    this.name = 'BatchOperationError';
    this.reason = reason;
    this.details = details;
  }
}

export function isBatchOperationError(value: unknown): value is BatchOperationError {
  return typeof value === 'object' && value !== null && BATCH_ERROR_BRAND in value;
}

export function createError(
  reason: BatchErrorReason,
  message: string,
  details?: BatchErrorDetails
): BatchOperationError {
  return new BatchOperationError(reason, message, details);
}

export function throwError(reason: BatchErrorReason, message: string, details?: BatchErrorDetails): never {
  throw createError(reason, message, details);
}
