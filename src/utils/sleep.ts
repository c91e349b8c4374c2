import { setTimeout as delay } from "timers/promises";

export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

/**
 * Espera `ms` milissegundos; rejeita com o motivo do abort se o sinal disparar.
 */
export const sleep: Sleep = async (ms, signal) => {
  if (signal?.aborted) {
    throw signal.reason;
  }
  try {
    await delay(ms, undefined, { signal });
  } catch (error) {
    if (signal?.aborted) {
      throw signal.reason;
    }
    throw error;
  }
};
