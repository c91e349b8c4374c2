import { z } from "zod";
import { ClientConfigError } from "../domain/errors/NowPaymentsError";
import { formatZodIssues } from "../utils/zodIssues";

export const NOWPAYMENTS_PRODUCTION_URL = "https://api.nowpayments.io/v1";
export const NOWPAYMENTS_SANDBOX_URL = "https://api-sandbox.nowpayments.io/v1";
export const DEFAULT_USER_AGENT = "nowpayments-client-node/1.0.0";

export const clientOptionsSchema = z.object({
  apiKey: z.string().min(1, "apiKey is required"),
  sandbox: z.boolean().default(false),
  // Host explícito (mock server, proxy) tem precedência sobre sandbox/produção
  baseUrl: z.string().url("baseUrl must be a valid URL").optional(),
  timeoutMs: z.number().int().positive().default(30_000),
  maxRetries: z.number().int().min(0, "maxRetries must be >= 0").default(3),
  retryBaseDelayMs: z.number().int().min(0).default(1_000),
  userAgent: z.string().min(1).default(DEFAULT_USER_AGENT),
});

export type NowPaymentsClientOptions = z.input<typeof clientOptionsSchema>;

export interface NowPaymentsClientConfig {
  readonly apiKey: string;
  readonly baseUrl: string;
  readonly timeoutMs: number;
  readonly maxRetries: number;
  readonly retryBaseDelayMs: number;
  readonly userAgent: string;
}

export const resolveBaseUrl = (sandbox: boolean, override?: string): string => {
  const url = override ?? (sandbox ? NOWPAYMENTS_SANDBOX_URL : NOWPAYMENTS_PRODUCTION_URL);
  return url.replace(/\/+$/, "");
};

export const resolveClientConfig = (options: NowPaymentsClientOptions): NowPaymentsClientConfig => {
  const parsed = clientOptionsSchema.safeParse(options);
  if (!parsed.success) {
    throw new ClientConfigError("Invalid NOWPayments client options", formatZodIssues(parsed.error));
  }

  const { apiKey, sandbox, baseUrl, timeoutMs, maxRetries, retryBaseDelayMs, userAgent } = parsed.data;

  return Object.freeze({
    apiKey,
    baseUrl: resolveBaseUrl(sandbox, baseUrl),
    timeoutMs,
    maxRetries,
    retryBaseDelayMs,
    userAgent,
  });
};
