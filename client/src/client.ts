import { HttpClient } from "./http";
import { AccountResource } from "./resources/account";
import type { GatewayClientOptions } from "./types";

/**
 * Node.js client for the quota gateway.
 *
 * @example
 * ```ts
 * import { GatewayClient } from "quota-gateway-client";
 *
 * const client = new GatewayClient({ baseUrl: "https://gateway.example.com" });
 *
 * await client.account.login({ email: "a@example.com", password: "pw" });
 * const { response, tokens } = await client.account.chat({ message: "Hello" });
 * const { used, quota } = await client.account.usage();
 * ```
 */
export class GatewayClient {
  readonly account: AccountResource;

  private readonly http: HttpClient;

  constructor(options: GatewayClientOptions) {
    if (!options.baseUrl) {
      throw new Error("GatewayClient: baseUrl is required");
    }

    this.http = new HttpClient(options.baseUrl, options.token);
    this.account = new AccountResource(this.http);
  }

  /** Use an already-issued bearer token for subsequent requests. */
  setAuthToken(token: string): void {
    this.http.setToken(token);
  }

  clearAuthToken(): void {
    this.http.setToken(undefined);
  }

  getAuthToken(): string | undefined {
    return this.http.getToken();
  }
}
