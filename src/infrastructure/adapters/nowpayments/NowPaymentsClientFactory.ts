import { NowPaymentsClientOptions, resolveClientConfig } from "../../../config/clientConfig";
import { clientOptionsFromEnv, parseEnv } from "../../../config/env";
import { NowPaymentsClient } from "./NowPaymentsClient";
import { NowPaymentsRequestDispatcher, NowPaymentsRequestDispatcherDeps } from "./NowPaymentsRequestDispatcher";

/**
 * Monta dispatcher + client a partir de opções explícitas.
 *
 * @throws {ClientConfigError} opções inválidas (apiKey vazia, timeout negativo...)
 */
export const createNowPaymentsClient = (
  options: NowPaymentsClientOptions,
  deps: NowPaymentsRequestDispatcherDeps = {}
): NowPaymentsClient => {
  const config = resolveClientConfig(options);
  const dispatcher = new NowPaymentsRequestDispatcher(config, deps);
  return new NowPaymentsClient(dispatcher, deps.logger);
};

export const createNowPaymentsClientFromEnv = (
  source: NodeJS.ProcessEnv = process.env,
  deps: NowPaymentsRequestDispatcherDeps = {}
): NowPaymentsClient => createNowPaymentsClient(clientOptionsFromEnv(parseEnv(source)), deps);
