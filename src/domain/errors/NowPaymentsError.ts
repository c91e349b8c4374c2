/**
 * Erro único da API NOWPayments, discriminado por `kind`.
 *
 * A área de negócio (payment, payout, ...) vem do path da requisição; o status
 * HTTP e o corpo de erro parseado acompanham o erro para diagnóstico.
 */

import { JsonObject } from "../types/Json";

export const NOWPAYMENTS_ERROR_KINDS = [
  "transport",
  "rate_limited",
  "authentication",
  "validation",
  "payment",
  "payout",
  "subscription",
  "custody",
  "conversion",
  "generic",
] as const;

export type NowPaymentsErrorKind = (typeof NOWPAYMENTS_ERROR_KINDS)[number];

export interface NowPaymentsErrorParams {
  kind: NowPaymentsErrorKind;
  message: string;
  statusCode?: number;
  responseData?: JsonObject;
  cause?: unknown;
}

export class NowPaymentsError extends Error {
  readonly kind: NowPaymentsErrorKind;
  readonly statusCode: number | undefined;
  readonly responseData: JsonObject;

  constructor(params: NowPaymentsErrorParams) {
    super(params.message, params.cause === undefined ? undefined : { cause: params.cause });
    this.name = "NowPaymentsError";
    this.kind = params.kind;
    this.statusCode = params.statusCode;
    this.responseData = params.responseData ?? {};
  }
}

export const isNowPaymentsError = (
  error: unknown,
  kind?: NowPaymentsErrorKind
): error is NowPaymentsError =>
  error instanceof NowPaymentsError && (kind === undefined || error.kind === kind);

export class InvalidRequestSpecError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvalidRequestSpecError";
  }
}

export class ClientConfigError extends Error {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(issues.length > 0 ? `${message}: ${issues.join("; ")}` : message);
    this.name = "ClientConfigError";
    this.issues = issues;
  }
}
