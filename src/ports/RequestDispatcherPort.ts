import { JsonValue } from "../domain/types/Json";
import { HttpMethod, QueryParams } from "./HttpTransportPort";

export interface RequestSpec {
  method: HttpMethod;
  path: string;
  body?: JsonValue;
  query?: QueryParams;
  headers?: Record<string, string>;
}

export interface ExecuteOptions {
  signal?: AbortSignal;
}

export interface RequestDispatcherPort {
  execute(spec: RequestSpec, options?: ExecuteOptions): Promise<JsonValue>;
}
