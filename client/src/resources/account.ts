import { HttpClient } from "../http";
import type {
  Credentials,
  RegisterResponse,
  LoginResponse,
  ChatRequest,
  ChatResponse,
  UsageResponse,
} from "../types";

/**
 * Account lifecycle and metered calls.
 *
 * `chat()` and `usage()` use the token stored by the last successful
 * `login()`, or one set via `client.setAuthToken()`.
 */
export class AccountResource {
  constructor(private readonly http: HttpClient) {}

  /** Register a new account. Registration does not log in. */
  register(data: Credentials): Promise<RegisterResponse> {
    return this.http.post<RegisterResponse>("/register", data);
  }

  /**
   * Log in with email and password. The returned token is stored and used
   * for subsequent requests.
   */
  async login(data: Credentials): Promise<LoginResponse> {
    const result = await this.http.post<LoginResponse>("/login", data);
    this.http.setToken(result.access_token);
    return result;
  }

  /** Send a text prompt; the cost is charged to the current billing cycle. */
  chat(data: ChatRequest): Promise<ChatResponse> {
    return this.http.authPost<ChatResponse>("/chat", { type: "text", ...data });
  }

  /** Usage and quota for the current billing cycle. */
  usage(): Promise<UsageResponse> {
    return this.http.authGet<UsageResponse>("/usage");
  }
}
