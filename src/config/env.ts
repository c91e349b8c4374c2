// 🔐 SECURITY: API key e IPN secret validados antes de qualquer chamada à NOWPayments
// 🛠️ MAINTAINABILITY: Contrato explícito das variáveis de ambiente da biblioteca
// 🧪 TESTABILITY: parseEnv recebe a fonte, então os testes não tocam em process.env

/**
 * @security Nunca logar NOWPAYMENTS_API_KEY nem NOWPAYMENTS_IPN_SECRET
 * @maintainability O env só produz opções; o client é sempre construído explicitamente
 */

import { z } from "zod";
import { NowPaymentsClientOptions } from "./clientConfig";
import { ClientConfigError } from "../domain/errors/NowPaymentsError";
import { formatZodIssues } from "../utils/zodIssues";

const booleanFlag = z.string().default("false").transform((v) => v === "true");
const digits = (fallback: string) => z.string().regex(/^\d+$/, "must be a non-negative integer").default(fallback).transform(Number);

export const envSchema = z.object({
  NODE_ENV: z.enum(["development", "test", "production"]).default("development"),
  LOG_LEVEL: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).optional(),

  // NOWPayments API
  NOWPAYMENTS_API_KEY: z.string().min(1, "NOWPAYMENTS_API_KEY is required"),
  NOWPAYMENTS_IPN_SECRET: z.string().min(1).optional(), // Necessário apenas para validar IPN
  NOWPAYMENTS_SANDBOX: booleanFlag,
  NOWPAYMENTS_API_URL: z.string().url().optional(), // Sobrescreve sandbox/produção
  NOWPAYMENTS_TIMEOUT_MS: digits("30000"),
  NOWPAYMENTS_MAX_RETRIES: digits("3"),
  NOWPAYMENTS_RETRY_BASE_DELAY_MS: digits("1000"),
});

export type Env = z.infer<typeof envSchema>;

export const parseEnv = (source: NodeJS.ProcessEnv = process.env): Env => {
  const parsed = envSchema.safeParse(source);
  if (!parsed.success) {
    throw new ClientConfigError("Invalid environment variables", formatZodIssues(parsed.error));
  }
  return parsed.data;
};

export const clientOptionsFromEnv = (env: Env): NowPaymentsClientOptions => ({
  apiKey: env.NOWPAYMENTS_API_KEY,
  sandbox: env.NOWPAYMENTS_SANDBOX,
  baseUrl: env.NOWPAYMENTS_API_URL,
  timeoutMs: env.NOWPAYMENTS_TIMEOUT_MS,
  maxRetries: env.NOWPAYMENTS_MAX_RETRIES,
  retryBaseDelayMs: env.NOWPAYMENTS_RETRY_BASE_DELAY_MS,
});
