import { JsonValue } from "../domain/types/Json";

export type HttpMethod = "GET" | "POST" | "PATCH" | "DELETE";

export type QueryValue = string | number | boolean | undefined;

export type QueryParams = Record<string, QueryValue>;

export interface HttpTransportRequest {
  method: HttpMethod;
  url: string;
  headers: Record<string, string>;
  query?: QueryParams;
  body?: JsonValue;
  timeoutMs: number;
  signal?: AbortSignal;
}

export interface HttpTransportResponse {
  status: number;
  body: string;
}

/**
 * Falha de rede (conexão recusada, DNS, timeout). Respostas HTTP, de qualquer
 * status, nunca viram HttpTransportError.
 */
export class HttpTransportError extends Error {
  readonly code: string | undefined;

  constructor(message: string, code?: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = "HttpTransportError";
    this.code = code;
  }
}

export interface HttpTransportPort {
  send(request: HttpTransportRequest): Promise<HttpTransportResponse>;
}
