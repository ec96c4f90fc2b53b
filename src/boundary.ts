import { randomUUID } from 'node:crypto';

export type BoundaryScope = 'batch' | 'changeset';

export type RandomId = () => string;

/**
 * Allocates multipart delimiter tokens, e.g. `batch_<uuid>` or
 * `changesetresponse_<uuid>` when writing a response.
 */
export class BoundaryAllocator {
  #randomId: RandomId;
  #writingResponse: boolean;

  constructor(writingResponse: boolean, randomId: RandomId = randomUUID) {
    this.#writingResponse = writingResponse;
    this.#randomId = randomId;
  }

  batch(): string {
    return this.allocate('batch');
  }

  changeset(): string {
    return this.allocate('changeset');
  }

  private allocate(scope: BoundaryScope): string {
    const prefix = this.#writingResponse ? `${scope}response` : scope;
    return `${prefix}_${this.#randomId()}`;
  }
}
