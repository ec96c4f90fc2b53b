// ============================================================================
// Batch output
// ============================================================================

import { once } from 'node:events';
import type { Writable } from 'node:stream';

/**
 * Destination of a batch payload. Writes are ordered; `flush` blocks the
 * caller until the data is handed to the transport, `flushAsync` may suspend.
 */
export interface BatchOutput {
  write(chunk: Uint8Array): void;
  flush(): void;
  flushAsync(): Promise<void>;
}

const encoder = new TextEncoder();

export function encodeText(text: string): Uint8Array {
  return encoder.encode(text);
}

// ============================================================================
// Text writer
// ============================================================================

/**
 * Buffers preamble text and encodes it into the output on `flush()`.
 * Closed while an operation body is written straight to the output.
 */
export class BatchTextWriter {
  #output: BatchOutput;
  #pending: string[] = [];
  #closed = false;

  constructor(output: BatchOutput) {
    this.#output = output;
  }

  get closed(): boolean {
    return this.#closed;
  }

  write(text: string): void {
    if (this.#closed) {
      throw new Error('Cannot write to a closed batch text writer');
    }
    this.#pending.push(text);
  }

  writeLine(text = ''): void {
    this.write(`${text}\r\n`);
  }

  flush(): void {
    if (this.#pending.length === 0) return;
    const text = this.#pending.join('');
    this.#pending = [];
    this.#output.write(encodeText(text));
  }

  close(): void {
    this.flush();
    this.#closed = true;
  }
}

// ============================================================================
// Outputs
// ============================================================================

/**
 * Collects the payload in memory.
 */
export class MemoryOutput implements BatchOutput {
  #chunks: Uint8Array[] = [];
  #flushCount = 0;

  write(chunk: Uint8Array): void {
    this.#chunks.push(chunk);
  }

  flush(): void {
    this.#flushCount++;
  }

  async flushAsync(): Promise<void> {
    this.#flushCount++;
  }

  get flushCount(): number {
    return this.#flushCount;
  }

  bytes(): Uint8Array {
    const size = this.#chunks.reduce((total, chunk) => total + chunk.byteLength, 0);
    const result = new Uint8Array(size);
    let offset = 0;
    for (const chunk of this.#chunks) {
      result.set(chunk, offset);
      offset += chunk.byteLength;
    }
    return result;
  }

  text(): string {
    return new TextDecoder().decode(this.bytes());
  }
}

/**
 * Writes the payload into a Node.js writable stream.
 *
 * `flush()` cannot wait for the stream, so it only surfaces a stream error;
 * `flushAsync()` also waits for `drain` when the stream buffer is full.
 */
export class StreamOutput implements BatchOutput {
  #stream: Writable;

  constructor(stream: Writable) {
    this.#stream = stream;
  }

  write(chunk: Uint8Array): void {
    this.verifyStream();
    this.#stream.write(chunk);
  }

  flush(): void {
    this.verifyStream();
  }

  async flushAsync(): Promise<void> {
    this.verifyStream();
    if (this.#stream.writableNeedDrain) {
      await once(this.#stream, 'drain');
    }
  }

  private verifyStream(): void {
    const error = this.#stream.errored;
    if (error) throw error;
    if (this.#stream.destroyed) {
      throw new Error('Batch output stream has been destroyed');
    }
  }
}
