export { MultipartMixedBatchWriter } from './multipart-writer.js';
export type { BatchWriter } from './types.js';
export { canTransition, isTerminalState, validateChangesetScope, validateTransition } from './states.js';
export type { BatchWriterState } from './states.js';

export {
  OperationBodyStream,
  OperationMessage,
  OperationMessageFactory,
  OperationRequestMessage,
  OperationResponseMessage,
} from './messages.js';
export type { OperationStreamListener } from './messages.js';
export { OperationHeaders } from './headers.js';

export { BatchTextWriter, MemoryOutput, StreamOutput } from './output.js';
export type { BatchOutput } from './output.js';

export { BoundaryAllocator } from './boundary.js';
export type { RandomId } from './boundary.js';

export {
  ContentIdTable,
  parseContentIdReference,
  resolveOperationUri,
  substituteContentIdReferences,
} from './content-ids.js';
export type { ReadonlyContentIds, UriResolutionContext, UriResolver } from './content-ids.js';

export { createMultipartMixedContentType, normalizePath } from './serialization.js';
export type { BatchPayloadUriOption } from './serialization.js';

export { defineSettings, resolveSettings } from './config.js';
export type { BatchWriterMode, BatchWriterSettings, ConcurrencyMode } from './config.js';

export { BatchOperationError, isBatchOperationError } from './errors.js';
export type { BatchErrorDetails, BatchErrorReason } from './errors.js';

export { getStatusMessage, isQueryMethod } from './http.js';
export { LOG_CATEGORY } from './logger.js';

export { BatchChangeset, OdataBatch, contentIdReference } from './batch.js';
export type { BatchOperationOptions, OdataBatchClientOptions } from './batch.js';
