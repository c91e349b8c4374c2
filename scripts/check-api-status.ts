/**
 * Verifica credenciais e disponibilidade da API NOWPayments
 *
 * Uso:
 *   npm run status
 */

import { config } from "dotenv";
config();

import { isNowPaymentsError } from "../src/domain/errors/NowPaymentsError";
import { createNowPaymentsClientFromEnv } from "../src/infrastructure/adapters/nowpayments/NowPaymentsClientFactory";

async function main(): Promise<void> {
  const client = createNowPaymentsClientFromEnv();

  console.log("═".repeat(60));
  console.log("🔍 NOWPayments API status\n");

  const status = await client.getStatus();
  console.log(`✅ /status: ${status.message}`);

  const currencies = await client.getMerchantCurrencies();
  console.log(`💱 Moedas habilitadas (${currencies.length}): ${currencies.slice(0, 10).join(", ")}`);

  const estimate = await client.getEstimate({ amount: 100, currency_from: "usd", currency_to: "btc" });
  console.log(`📈 100 USD ≈ ${estimate.estimated_amount} BTC`);
}

main().catch((error: unknown) => {
  if (isNowPaymentsError(error)) {
    console.error(`❌ [${error.kind}] ${error.message}${error.statusCode ? ` (HTTP ${error.statusCode})` : ""}`);
  } else {
    console.error(`❌ ${error instanceof Error ? error.message : "Erro desconhecido"}`);
  }
  process.exit(1);
});
