function stringField(body: unknown, key: string): string | undefined {
  if (typeof body !== "object" || body === null || !(key in body)) return undefined;
  const value: unknown = Reflect.get(body, key);
  return typeof value === "string" ? value : undefined;
}

/**
 * Thrown when the gateway returns a non-2xx response.
 */
export class GatewayApiError extends Error {
  /** HTTP status code returned by the gateway. */
  readonly status: number;
  /** Stable error code from the response body (e.g. "quota_exhausted"), when present. */
  readonly code?: string;
  /** Raw response body. */
  readonly body: unknown;

  constructor(status: number, body: unknown) {
    super(stringField(body, "error") ?? `Gateway API error (HTTP ${status})`);
    this.name = "GatewayApiError";
    this.status = status;
    this.code = stringField(body, "code");
    this.body = body;
  }
}
