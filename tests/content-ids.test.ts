import { test, expect } from 'vitest';
import {
  ContentIdTable,
  type UriResolutionContext,
  parseContentIdReference,
  resolveOperationUri,
  substituteContentIdReferences,
} from '../src/content-ids.js';
import { MultipartMixedBatchWriter } from '../src/multipart-writer.js';
import { MemoryOutput } from '../src/output.js';
import { BatchOperationError } from '../src/errors.js';

function tableWith(entries: Record<string, string>): ContentIdTable {
  const table = new ContentIdTable();
  for (const [contentId, uri] of Object.entries(entries)) {
    table.register(contentId, uri);
  }
  return table;
}

// ============================================================================
// parseContentIdReference
// ============================================================================

test.each([
  ['$1', '1'],
  ['$1/Orders', '1'],
  ['$new-customer/Orders?$top=1', 'new-customer'],
  ['$2(3)', '2'],
])('parseContentIdReference - %s references %s', (uri, contentId) => {
  expect(parseContentIdReference(uri)).toBe(contentId);
});

test.each(['Customers', '$metadata', '$batch', '$entity?$id=Customers(1)', '$crossjoin(A,B)', '$all', '$', '/$1'])(
  'parseContentIdReference - %s is not a reference',
  (uri) => {
    expect(parseContentIdReference(uri)).toBeUndefined();
  }
);

// ============================================================================
// resolveOperationUri
// ============================================================================

const customerIds = tableWith({ '1': 'https://host/service/Customers' });

test('resolveOperationUri - relative URIs are joined to the base URL', () => {
  expect(resolveOperationUri('Customers(1)', { baseUrl: 'https://host/service', contentIds: customerIds })).toBe(
    'https://host/service/Customers(1)'
  );
  expect(resolveOperationUri('/Customers(1)', { baseUrl: 'https://host/service/', contentIds: customerIds })).toBe(
    'https://host/service/Customers(1)'
  );
});

test('resolveOperationUri - without a base URL relative URIs stay as written', () => {
  expect(resolveOperationUri('Customers(1)', { contentIds: customerIds })).toBe('Customers(1)');
});

test('resolveOperationUri - absolute URIs pass through', () => {
  expect(
    resolveOperationUri('https://other/Orders', { baseUrl: 'https://host/service/', contentIds: customerIds })
  ).toBe('https://other/Orders');
});

test('resolveOperationUri - known references stay as written', () => {
  expect(resolveOperationUri('$1/Orders', { baseUrl: 'https://host/service/', contentIds: customerIds })).toBe(
    '$1/Orders'
  );
});

test('resolveOperationUri - unknown references are rejected', () => {
  expect(() => resolveOperationUri('$2/Orders', { contentIds: customerIds })).toThrow(
    "Content-ID '2' referenced by '$2/Orders' was not found"
  );
});

test('resolveOperationUri - system resources are joined like any path', () => {
  expect(resolveOperationUri('$metadata', { baseUrl: 'https://host/service/', contentIds: customerIds })).toBe(
    'https://host/service/$metadata'
  );
});

// ============================================================================
// substituteContentIdReferences
// ============================================================================

const orderIds = tableWith({ '1': 'https://host/service/Customers(7)', c: 'https://host/service/Orders' });

test('substitute - replaces the reference with the registered URI', () => {
  expect(substituteContentIdReferences('$1', { contentIds: orderIds })).toBe('https://host/service/Customers(7)');
  expect(substituteContentIdReferences('$1/Orders', { contentIds: orderIds })).toBe(
    'https://host/service/Customers(7)/Orders'
  );
  expect(substituteContentIdReferences('$c?$top=2', { contentIds: orderIds })).toBe(
    'https://host/service/Orders?$top=2'
  );
});

test('substitute - falls back to the default resolution', () => {
  expect(substituteContentIdReferences('Customers', { baseUrl: 'https://host/service/', contentIds: orderIds })).toBe(
    'https://host/service/Customers'
  );
  expect(() => substituteContentIdReferences('$9', { contentIds: orderIds })).toThrow(BatchOperationError);
});

// ============================================================================
// Content-IDs in a batch
// ============================================================================

function createWriter() {
  const output = new MemoryOutput();
  const writer = new MultipartMixedBatchWriter(output, { batchBoundary: 'batch_X', baseUrl: 'https://host/service/' });
  writer.startBatch();
  return { output, writer };
}

function reasonOf(action: () => unknown): string | undefined {
  try {
    action();
  } catch (error) {
    if (error instanceof BatchOperationError) return error.reason;
    throw error;
  }
  return undefined;
}

test('batch - a Content-ID can be used once per batch', () => {
  const { writer } = createWriter();
  writer.startChangeset();
  writer.createOperationRequestMessage('POST', 'Customers', '1');
  writer.endChangeset();
  writer.startChangeset();

  expect(reasonOf(() => writer.createOperationRequestMessage('POST', 'Customers', '1'))).toBe('DuplicateContentId');
});

test('batch - a top-level Content-ID still counts as used', () => {
  const { writer } = createWriter();
  writer.createOperationRequestMessage('POST', 'Customers', '1');

  expect(reasonOf(() => writer.createOperationRequestMessage('POST', 'Customers', '1'))).toBe('DuplicateContentId');
});

test('batch - an operation cannot reference its own Content-ID', () => {
  const { writer } = createWriter();
  writer.startChangeset();

  expect(reasonOf(() => writer.createOperationRequestMessage('PATCH', '$1', '1'))).toBe(
    'ContentIdReferenceNotFound'
  );
});

test('batch - a reference becomes valid once the referenced operation is written', () => {
  const { output, writer } = createWriter();
  writer.startChangeset();
  const body = writer.createOperationRequestMessage('POST', 'Customers', '1').getStream();
  body.write('{}');
  body.close();
  writer.createOperationRequestMessage('POST', '$1/Orders', '2');
  writer.endChangeset();
  writer.endBatch();

  expect(output.text()).toContain('\r\nPOST $1/Orders HTTP/1.1\r\nContent-ID: 2\r\n\r\n');
});

test('batch - references do not reach into a later changeset', () => {
  const { writer } = createWriter();
  writer.startChangeset();
  writer.createOperationRequestMessage('POST', 'Customers', '1');
  writer.endChangeset();
  writer.startChangeset();

  expect(reasonOf(() => writer.createOperationRequestMessage('PATCH', '$1', '2'))).toBe('ContentIdReferenceNotFound');
  expect(writer.state).toBe('Error');
});

test('batch - top-level operations cannot be referenced', () => {
  const { writer } = createWriter();
  writer.createOperationRequestMessage('POST', 'Customers', '1');

  expect(reasonOf(() => writer.createOperationRequestMessage('PATCH', '$1/Name'))).toBe('ContentIdReferenceNotFound');
});

test('batch - a new changeset reuses no earlier references', () => {
  const { output, writer } = createWriter();
  writer.startChangeset();
  writer.createOperationRequestMessage('POST', 'Customers', '1');
  writer.createOperationRequestMessage('PATCH', '$1', '2');
  writer.endChangeset();
  writer.startChangeset();
  writer.createOperationRequestMessage('POST', 'Orders', '3');
  writer.createOperationRequestMessage('PATCH', '$3', '4');
  writer.endChangeset();
  writer.endBatch();

  expect(writer.state).toBe('BatchCompleted');
  expect(output.text()).toContain('\r\nPATCH $3 HTTP/1.1\r\nContent-ID: 4\r\n\r\n');
});

test('batch - resolvers see the ids of the open changeset through a read-only view', () => {
  const seen: { uri: string; known: string | undefined; writable: boolean }[] = [];
  let lastContext: UriResolutionContext | undefined;
  const output = new MemoryOutput();
  const writer = new MultipartMixedBatchWriter(output, {
    batchBoundary: 'batch_X',
    baseUrl: 'https://host/service/',
    resolveUri: (uri, context) => {
      seen.push({ uri, known: context.contentIds.get('1'), writable: 'register' in context.contentIds });
      lastContext = context;
      return resolveOperationUri(uri, context);
    },
  });
  writer.startBatch();
  writer.startChangeset();
  writer.createOperationRequestMessage('POST', 'Customers', '1');
  writer.createOperationRequestMessage('PATCH', '$1', '2');

  expect(seen).toEqual([
    { uri: 'Customers', known: undefined, writable: false },
    { uri: '$1', known: 'https://host/service/Customers', writable: false },
  ]);

  writer.endChangeset();

  expect(lastContext?.contentIds.has('1')).toBe(false);
});

test('batch - substitution writes the referenced URI', () => {
  const output = new MemoryOutput();
  const writer = new MultipartMixedBatchWriter(output, {
    batchBoundary: 'batch_X',
    baseUrl: 'https://host/service/',
    resolveUri: substituteContentIdReferences,
  });
  writer.startBatch();
  writer.startChangeset();
  writer.createOperationRequestMessage('POST', 'Customers', '1');
  const second = writer.createOperationRequestMessage('POST', '$1/Orders', '2');

  expect(second.url).toBe('https://host/service/Customers/Orders');
});

test('batch - response Content-IDs are not registered', () => {
  const output = new MemoryOutput();
  const writer = new MultipartMixedBatchWriter(output, { batchBoundary: 'batch_X', mode: 'response' });
  writer.startBatch();
  writer.createOperationResponseMessage('1');
  writer.createOperationResponseMessage('1');
  writer.endBatch();

  expect(writer.state).toBe('BatchCompleted');
});
