import { describe, expect, it } from "@jest/globals";
import { ClientConfigError } from "../../domain/errors/NowPaymentsError";
import { clientOptionsFromEnv, parseEnv } from "../env";

describe("env", () => {
  it("aplica defaults e converte números", () => {
    const env = parseEnv({ NOWPAYMENTS_API_KEY: "test-key" });

    expect(env).toEqual({
      NODE_ENV: "development",
      NOWPAYMENTS_API_KEY: "test-key",
      NOWPAYMENTS_SANDBOX: false,
      NOWPAYMENTS_TIMEOUT_MS: 30_000,
      NOWPAYMENTS_MAX_RETRIES: 3,
      NOWPAYMENTS_RETRY_BASE_DELAY_MS: 1_000,
    });
  });

  it("só 'true' liga o sandbox", () => {
    expect(parseEnv({ NOWPAYMENTS_API_KEY: "test-key", NOWPAYMENTS_SANDBOX: "true" }).NOWPAYMENTS_SANDBOX).toBe(true);
    expect(parseEnv({ NOWPAYMENTS_API_KEY: "test-key", NOWPAYMENTS_SANDBOX: "1" }).NOWPAYMENTS_SANDBOX).toBe(false);
  });

  it("mapeia para as opções do client", () => {
    const env = parseEnv({
      NOWPAYMENTS_API_KEY: "test-key",
      NOWPAYMENTS_SANDBOX: "true",
      NOWPAYMENTS_API_URL: "http://localhost:4010/v1",
      NOWPAYMENTS_TIMEOUT_MS: "5000",
      NOWPAYMENTS_MAX_RETRIES: "0",
      NOWPAYMENTS_RETRY_BASE_DELAY_MS: "250",
    });

    expect(clientOptionsFromEnv(env)).toEqual({
      apiKey: "test-key",
      sandbox: true,
      baseUrl: "http://localhost:4010/v1",
      timeoutMs: 5_000,
      maxRetries: 0,
      retryBaseDelayMs: 250,
    });
  });

  it("falha sem API key ou com número inválido", () => {
    expect(() => parseEnv({})).toThrow(ClientConfigError);
    expect(() => parseEnv({ NOWPAYMENTS_API_KEY: "test-key", NOWPAYMENTS_MAX_RETRIES: "-1" })).toThrow(
      "Invalid environment variables: NOWPAYMENTS_MAX_RETRIES: must be a non-negative integer"
    );
  });
});
