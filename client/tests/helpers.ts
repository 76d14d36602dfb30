/**
 * Test helpers – fetch mock utilities.
 *
 * The global `fetch` is mocked so that no real HTTP calls are made.
 */
import { expect, vi } from "vitest";

export interface MockResponse {
  status?: number;
  body?: unknown;
  contentType?: string;
}

/**
 * Make the next `fetch` call resolve with the given response. Returns the spy
 * so callers can assert on it.
 */
export function mockFetch(response: MockResponse) {
  const { status = 200, body = {}, contentType = "application/json" } = response;
  const text = typeof body === "string" ? body : JSON.stringify(body);

  return vi
    .spyOn(globalThis, "fetch")
    .mockResolvedValueOnce(
      new Response(text, { status, headers: { "content-type": contentType } })
    );
}

type FetchSpy = ReturnType<typeof mockFetch>;

/**
 * Assert that the mocked fetch was called once with the expected URL and options.
 */
export function expectFetchCall(
  spy: FetchSpy,
  expectedUrl: string,
  expectedOptions?: {
    method?: string;
    body?: Record<string, unknown>;
    authHeader?: string | null;
  }
): void {
  expect(spy).toHaveBeenCalledTimes(1);
  const [url, init] = spy.mock.calls[0];
  expect(url).toBe(expectedUrl);

  if (expectedOptions?.method) {
    expect(init?.method).toBe(expectedOptions.method);
  }

  if (expectedOptions?.body) {
    expect(JSON.parse(String(init?.body))).toEqual(expectedOptions.body);
  }

  if (expectedOptions?.authHeader !== undefined) {
    const headers = new Headers(init?.headers);
    expect(headers.get("Authorization")).toBe(expectedOptions.authHeader);
  }
}
