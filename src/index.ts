export {
  canonicalizeIpnPayload,
  computeIpnSignature,
  findSignatureHeader,
  IPN_SIGNATURE_HEADER,
  IpnSignatureVerifier,
  verifySignature,
} from "./application/services/IpnSignatureVerifier";
export type { IpnHeaders } from "./application/services/IpnSignatureVerifier";

export {
  clientOptionsSchema,
  DEFAULT_USER_AGENT,
  NOWPAYMENTS_PRODUCTION_URL,
  NOWPAYMENTS_SANDBOX_URL,
  resolveBaseUrl,
  resolveClientConfig,
} from "./config/clientConfig";
export type { NowPaymentsClientConfig, NowPaymentsClientOptions } from "./config/clientConfig";
export { clientOptionsFromEnv, envSchema, parseEnv } from "./config/env";
export type { Env } from "./config/env";

export {
  ClientConfigError,
  InvalidRequestSpecError,
  isNowPaymentsError,
  NOWPAYMENTS_ERROR_KINDS,
  NowPaymentsError,
} from "./domain/errors/NowPaymentsError";
export type { NowPaymentsErrorKind } from "./domain/errors/NowPaymentsError";
export { isJsonObject } from "./domain/types/Json";
export type { JsonObject, JsonPrimitive, JsonValue } from "./domain/types/Json";

export { HttpTransportError } from "./ports/HttpTransportPort";
export type {
  HttpMethod,
  HttpTransportPort,
  HttpTransportRequest,
  HttpTransportResponse,
  QueryParams,
} from "./ports/HttpTransportPort";
export type { ExecuteOptions, RequestDispatcherPort, RequestSpec } from "./ports/RequestDispatcherPort";

export { AxiosHttpTransport } from "./infrastructure/adapters/http/AxiosHttpTransport";
export { classifyHttpFailure } from "./infrastructure/adapters/nowpayments/errorClassification";
export * from "./infrastructure/adapters/nowpayments/NowPaymentsClient";
export {
  createNowPaymentsClient,
  createNowPaymentsClientFromEnv,
} from "./infrastructure/adapters/nowpayments/NowPaymentsClientFactory";
export {
  computeBackoffDelay,
  NowPaymentsRequestDispatcher,
} from "./infrastructure/adapters/nowpayments/NowPaymentsRequestDispatcher";
export type { NowPaymentsRequestDispatcherDeps } from "./infrastructure/adapters/nowpayments/NowPaymentsRequestDispatcher";
export type {
  AddressValidation,
  ApiStatus,
  Conversion,
  Currency,
  Estimate,
  Invoice,
  MinAmount,
  Payment,
  PayoutBatch,
  PayoutWithdrawal,
  Subscription,
  SubscriptionPlan,
  Transfer,
  UserAccount,
  UserPayment,
} from "./infrastructure/adapters/nowpayments/schemas";
export { requireValidIpnSignature } from "./infrastructure/http/middlewares/requireValidIpnSignature";
export { logger, makeLogger } from "./infrastructure/logger";
export type { Logger } from "./infrastructure/logger";
