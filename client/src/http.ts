import { GatewayApiError } from "./error";

export type HttpMethod = "GET" | "POST";

export interface RequestOptions {
  method?: HttpMethod;
  path: string;
  body?: unknown;
  /** When true, send the stored bearer token and throw if none is set. */
  authenticated?: boolean;
}

/**
 * Minimal HTTP client that wraps the native `fetch` API.
 * Used internally by resource classes.
 */
export class HttpClient {
  private readonly baseUrl: string;
  /** Bearer token stored after a successful login. */
  private token?: string;

  constructor(baseUrl: string, token?: string) {
    // Strip trailing slash so path concatenation is predictable.
    this.baseUrl = baseUrl.replace(/\/$/, "");
    this.token = token;
  }

  setToken(token: string | undefined): void {
    this.token = token;
  }

  getToken(): string | undefined {
    return this.token;
  }

  async request<T>(opts: RequestOptions): Promise<T> {
    const headers: Record<string, string> = {
      "Content-Type": "application/json",
      Accept: "application/json",
    };

    if (opts.authenticated) {
      if (!this.token) {
        throw new Error(
          "No bearer token set. Call account.login() first, or set the token via client.setAuthToken()."
        );
      }
      headers.Authorization = `Bearer ${this.token}`;
    }

    const response = await fetch(`${this.baseUrl}${opts.path}`, {
      method: opts.method ?? "GET",
      headers,
      body: opts.body !== undefined ? JSON.stringify(opts.body) : undefined,
    });

    let responseBody: unknown;
    const contentType = response.headers.get("content-type") ?? "";
    if (contentType.includes("application/json")) {
      responseBody = await response.json();
    } else {
      responseBody = await response.text();
    }

    if (!response.ok) {
      throw new GatewayApiError(response.status, responseBody);
    }

    return responseBody as T;
  }

  post<T>(path: string, body?: unknown): Promise<T> {
    return this.request<T>({ method: "POST", path, body });
  }

  authGet<T>(path: string): Promise<T> {
    return this.request<T>({ path, authenticated: true });
  }

  authPost<T>(path: string, body?: unknown): Promise<T> {
    return this.request<T>({ method: "POST", path, body, authenticated: true });
  }
}
