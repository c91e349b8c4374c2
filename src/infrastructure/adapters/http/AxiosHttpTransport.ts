import axios, { AxiosInstance, isAxiosError } from "axios";
import {
  HttpTransportError,
  HttpTransportPort,
  HttpTransportRequest,
  HttpTransportResponse,
} from "../../../ports/HttpTransportPort";

/**
 * Uma tentativa HTTP via axios.
 *
 * Todo status HTTP é devolvido como resposta (validateStatus sempre true) e o
 * corpo chega cru, como texto: retry e classificação ficam com o dispatcher.
 */
export class AxiosHttpTransport implements HttpTransportPort {
  private readonly client: AxiosInstance;

  constructor(client?: AxiosInstance) {
    this.client = client ?? axios.create();
  }

  async send(request: HttpTransportRequest): Promise<HttpTransportResponse> {
    try {
      const response = await this.client.request<unknown>({
        method: request.method,
        url: request.url,
        headers: request.headers,
        params: request.query,
        data: request.body,
        timeout: request.timeoutMs,
        signal: request.signal,
        responseType: "text",
        transformResponse: (data: unknown) => data,
        validateStatus: () => true,
      });

      return {
        status: response.status,
        body: typeof response.data === "string" ? response.data : "",
      };
    } catch (error) {
      // Cancelamento pelo chamador não é falha de rede
      if (request.signal?.aborted) {
        throw request.signal.reason;
      }
      if (isAxiosError(error)) {
        throw new HttpTransportError(error.message, error.code, error);
      }
      throw error;
    }
  }
}
