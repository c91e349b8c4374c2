/**
 * Dispatcher HTTP da API NOWPayments
 *
 * Executa uma chamada lógica com retry (backoff exponencial) para falhas de
 * rede, 429 e 5xx, e classifica respostas de erro em NowPaymentsError.
 *
 * @security API key só trafega no header x-api-key; nunca é logada
 * @reliability No máximo maxRetries + 1 tentativas por chamada
 * @maintainability Transporte e sleep injetáveis (testes sem rede e sem espera)
 */

import { NowPaymentsClientConfig } from "../../../config/clientConfig";
import { InvalidRequestSpecError, NowPaymentsError } from "../../../domain/errors/NowPaymentsError";
import { JsonValue } from "../../../domain/types/Json";
import {
  HttpMethod,
  HttpTransportError,
  HttpTransportPort,
  HttpTransportResponse,
  QueryParams,
} from "../../../ports/HttpTransportPort";
import { ExecuteOptions, RequestDispatcherPort, RequestSpec } from "../../../ports/RequestDispatcherPort";
import { Sleep, sleep as defaultSleep } from "../../../utils/sleep";
import { AxiosHttpTransport } from "../http/AxiosHttpTransport";
import { logger as defaultLogger, Logger } from "../../logger";
import { buildHttpError, parseErrorBody } from "./errorClassification";

const SUPPORTED_METHODS: readonly HttpMethod[] = ["GET", "POST", "PATCH", "DELETE"];

export interface NowPaymentsRequestDispatcherDeps {
  transport?: HttpTransportPort;
  sleep?: Sleep;
  logger?: Logger;
}

export const computeBackoffDelay = (baseDelayMs: number, attempt: number): number =>
  baseDelayMs * 2 ** attempt;

const assertValidSpec = (spec: RequestSpec): void => {
  if (!SUPPORTED_METHODS.includes(spec.method)) {
    throw new InvalidRequestSpecError(`Unsupported HTTP method: ${String(spec.method)}`);
  }
  if (typeof spec.path !== "string" || spec.path.length === 0) {
    throw new InvalidRequestSpecError("Request path must be a non-empty string");
  }
};

const compactQuery = (query?: QueryParams): QueryParams | undefined => {
  if (!query) return undefined;
  return Object.fromEntries(Object.entries(query).filter(([, value]) => value !== undefined));
};

const parseSuccessBody = (response: HttpTransportResponse): JsonValue => {
  if (response.body.trim().length === 0) {
    return {};
  }
  try {
    const parsed: JsonValue = JSON.parse(response.body);
    return parsed;
  } catch (error) {
    throw new NowPaymentsError({
      kind: "generic",
      message: "Invalid JSON in response body",
      statusCode: response.status,
      cause: error,
    });
  }
};

export class NowPaymentsRequestDispatcher implements RequestDispatcherPort {
  private readonly transport: HttpTransportPort;
  private readonly sleep: Sleep;
  private readonly logger: Logger;
  private readonly defaultHeaders: Readonly<Record<string, string>>;

  constructor(
    private readonly config: NowPaymentsClientConfig,
    deps: NowPaymentsRequestDispatcherDeps = {}
  ) {
    this.transport = deps.transport ?? new AxiosHttpTransport();
    this.sleep = deps.sleep ?? defaultSleep;
    this.logger = deps.logger ?? defaultLogger;
    this.defaultHeaders = Object.freeze({
      "x-api-key": config.apiKey,
      "Content-Type": "application/json",
      Accept: "application/json",
      "User-Agent": config.userAgent,
    });
  }

  async execute(spec: RequestSpec, options: ExecuteOptions = {}): Promise<JsonValue> {
    assertValidSpec(spec);

    const { signal } = options;
    const { maxRetries, timeoutMs } = this.config;
    const url = `${this.config.baseUrl}${spec.path}`;
    const headers = { ...this.defaultHeaders, ...spec.headers };
    const query = compactQuery(spec.query);

    for (let attempt = 0; ; attempt++) {
      signal?.throwIfAborted();
      const canRetry = attempt < maxRetries;

      this.logger.debug({
        type: "NOWPAYMENTS_REQUEST",
        message: "Dispatching NOWPayments request",
        payload: { method: spec.method, path: spec.path, attempt },
      });

      let response: HttpTransportResponse;
      try {
        response = await this.transport.send({
          method: spec.method,
          url,
          headers,
          query,
          body: spec.body,
          timeoutMs,
          signal,
        });
      } catch (error) {
        if (!(error instanceof HttpTransportError)) {
          throw error;
        }
        if (canRetry) {
          await this.backoff(spec, attempt, `transport error: ${error.message}`, signal);
          continue;
        }
        throw new NowPaymentsError({
          kind: "transport",
          message: `Request failed: ${error.message}`,
          cause: error,
        });
      }

      if (response.status === 429) {
        if (canRetry) {
          await this.backoff(spec, attempt, "rate limited (429)", signal);
          continue;
        }
        throw new NowPaymentsError({
          kind: "rate_limited",
          message: "Rate limit exceeded",
          statusCode: response.status,
          responseData: parseErrorBody(response.body),
        });
      }

      if (response.status >= 500 && canRetry) {
        await this.backoff(spec, attempt, `server error (${response.status})`, signal);
        continue;
      }

      // 5xx esgotado cai na mesma classificação dos 4xx
      if (response.status >= 400) {
        const error = buildHttpError(response.status, spec.path, response.body);
        this.logger.error({
          type: "NOWPAYMENTS_REQUEST_FAILED",
          message: "NOWPayments request failed",
          payload: {
            method: spec.method,
            path: spec.path,
            status: response.status,
            kind: error.kind,
            attempts: attempt + 1,
          },
        });
        throw error;
      }

      return parseSuccessBody(response);
    }
  }

  private async backoff(
    spec: RequestSpec,
    attempt: number,
    reason: string,
    signal: AbortSignal | undefined
  ): Promise<void> {
    const delayMs = computeBackoffDelay(this.config.retryBaseDelayMs, attempt);
    this.logger.warn({
      type: "NOWPAYMENTS_RETRY",
      message: "Retrying NOWPayments request",
      payload: { method: spec.method, path: spec.path, attempt, reason, delayMs },
    });
    await this.sleep(delayMs, signal);
  }
}
