import { NowPaymentsError, NowPaymentsErrorKind } from "../../../domain/errors/NowPaymentsError";
import { isJsonObject, JsonObject } from "../../../domain/types/Json";

// Ordem importa: o primeiro fragmento contido no path define a área
const PATH_KINDS: ReadonlyArray<readonly [string, NowPaymentsErrorKind]> = [
  ["/payment", "payment"],
  ["/payout", "payout"],
  ["/subscription", "subscription"],
  ["/custody", "custody"],
  ["/conversion", "conversion"],
];

export const classifyHttpFailure = (status: number, path: string): NowPaymentsErrorKind => {
  if (status === 401) return "authentication";
  if (status === 422) return "validation";
  if (status === 429) return "rate_limited";

  const match = PATH_KINDS.find(([fragment]) => path.includes(fragment));
  return match ? match[1] : "generic";
};

/**
 * Corpo de erro como objeto JSON; vazio, não-JSON ou não-objeto viram `{}`.
 */
export const parseErrorBody = (body: string): JsonObject => {
  if (body.trim().length === 0) {
    return {};
  }
  try {
    const parsed: unknown = JSON.parse(body);
    return isJsonObject(parsed) ? parsed : {};
  } catch {
    // Proxies e balanceadores podem responder HTML
    return {};
  }
};

export const errorMessageFrom = (data: JsonObject, status: number): string =>
  typeof data.message === "string" ? data.message : `HTTP ${status}`;

export const buildHttpError = (status: number, path: string, body: string): NowPaymentsError => {
  const responseData = parseErrorBody(body);
  return new NowPaymentsError({
    kind: classifyHttpFailure(status, path),
    message: errorMessageFrom(responseData, status),
    statusCode: status,
    responseData,
  });
};
