// ============================================================================
// Operation messages
// ============================================================================

import { throwError } from './errors.js';
import { OperationHeaders } from './headers.js';
import { encodeText, type BatchOutput } from './output.js';

/**
 * Writer-side callbacks a message uses to hand its body over to the caller.
 */
export interface OperationStreamListener {
  notifyContentStreamRequested(): void;
  notifyContentStreamRequestedAsync(): Promise<void>;
  notifyContentStreamDisposed(): void;
}

type MessageInit = {
  output: BatchOutput;
  listener: OperationStreamListener;
  contentId?: string;
  onCompleted?: (message: OperationMessage) => void;
};

/**
 * Body of one operation, written straight into the batch output.
 * `close()` hands the output back to the batch writer.
 */
export class OperationBodyStream {
  #output: BatchOutput;
  #onClose: () => void;
  #closed = false;

  constructor(output: BatchOutput, onClose: () => void) {
    this.#output = output;
    this.#onClose = onClose;
  }

  get closed(): boolean {
    return this.#closed;
  }

  write(chunk: string | Uint8Array): void {
    if (this.#closed) {
      throw new Error('Cannot write to a closed operation body stream');
    }
    this.#output.write(typeof chunk === 'string' ? encodeText(chunk) : chunk);
  }

  close(): void {
    if (this.#closed) return;
    this.#closed = true;
    this.#onClose();
  }
}

export abstract class OperationMessage {
  readonly headers = new OperationHeaders();
  readonly contentId?: string;
  #output: BatchOutput;
  #listener: OperationStreamListener;
  #onCompleted?: (message: OperationMessage) => void;
  #streamRequested = false;
  #completed = false;

  constructor(init: MessageInit) {
    this.#output = init.output;
    this.#listener = init.listener;
    this.contentId = init.contentId;
    this.#onCompleted = init.onCompleted;
  }

  get completed(): boolean {
    return this.#completed;
  }

  setHeader(name: string, value: string): this {
    this.headers.set(name, value);
    return this;
  }

  getHeader(name: string): string | undefined {
    return this.headers.get(name);
  }

  /**
   * Writes the pending preamble and returns the body stream. Sync writers only.
   */
  getStream(): OperationBodyStream {
    this.verifyCanRequestStream();
    this.#listener.notifyContentStreamRequested();
    this.#streamRequested = true;
    return this.createStream();
  }

  /**
   * Writes the pending preamble and returns the body stream. Async writers only.
   */
  async getStreamAsync(): Promise<OperationBodyStream> {
    this.verifyCanRequestStream();
    await this.#listener.notifyContentStreamRequestedAsync();
    this.#streamRequested = true;
    return this.createStream();
  }

  /** @internal Called by the writer once the preamble is on the wire. */
  partHeaderProcessingCompleted(): void {
    if (this.#completed) return;
    this.#completed = true;
    this.headers.freeze();
    this.#onCompleted?.(this);
  }

  private verifyCanRequestStream(): void {
    if (this.#streamRequested) {
      throwError('OperationStreamAlreadyRequested', 'The body stream of this operation was already requested');
    }
    if (this.#completed) {
      throwError('OperationMessageCompleted', 'Cannot write the body of an operation that is already completed');
    }
  }

  private createStream(): OperationBodyStream {
    return new OperationBodyStream(this.#output, () => this.#listener.notifyContentStreamDisposed());
  }
}

export class OperationRequestMessage extends OperationMessage {
  readonly method: string;
  readonly url: string;

  constructor(init: MessageInit & { method: string; url: string }) {
    super(init);
    this.method = init.method;
    this.url = init.url;
  }
}

export class OperationResponseMessage extends OperationMessage {
  #statusCode = 200;

  get statusCode(): number {
    return this.#statusCode;
  }

  setStatus(statusCode: number): this {
    if (this.headers.readonly) {
      throwError('OperationMessageCompleted', 'Cannot change the status of an operation that is already written');
    }
    this.#statusCode = statusCode;
    return this;
  }
}

/**
 * Builds message handles bound to one writer's output and listener.
 */
export class OperationMessageFactory {
  #output: BatchOutput;
  #listener: OperationStreamListener;
  #onCompleted: (message: OperationMessage) => void;

  constructor(
    output: BatchOutput,
    listener: OperationStreamListener,
    onCompleted: (message: OperationMessage) => void
  ) {
    this.#output = output;
    this.#listener = listener;
    this.#onCompleted = onCompleted;
  }

  request(method: string, url: string, contentId?: string): OperationRequestMessage {
    return new OperationRequestMessage({
      output: this.#output,
      listener: this.#listener,
      onCompleted: this.#onCompleted,
      method,
      url,
      contentId,
    });
  }

  response(contentId?: string): OperationResponseMessage {
    return new OperationResponseMessage({
      output: this.#output,
      listener: this.#listener,
      onCompleted: this.#onCompleted,
      contentId,
    });
  }
}
