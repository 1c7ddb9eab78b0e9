import type { JsonResponse } from './types.js';

/** Records what a handler writes. */
export class StubResponse implements JsonResponse {
  statusCode = 200;
  body: unknown;

  status(code: number): this {
    this.statusCode = code;
    return this;
  }

  json(body: unknown): this {
    this.body = body;
    return this;
  }
}
