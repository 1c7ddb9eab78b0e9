/** The slice of an Express response the handlers write to. */
export interface JsonResponse {
  status(code: number): JsonResponse;
  json(body: unknown): unknown;
}
