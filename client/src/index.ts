export { GatewayClient } from "./client";
export { GatewayApiError } from "./error";

export type {
  GatewayClientOptions,
  Credentials,
  RegisterResponse,
  LoginResponse,
  ChatRequest,
  ChatResponse,
  CycleState,
  UsageResponse,
  GatewayErrorBody,
} from "./types";
