/**
 * Simula um IPN da NOWPayments assinado com NOWPAYMENTS_IPN_SECRET
 *
 * Uso:
 *   npm run simulate:ipn -- <url> [payload.json]
 *
 * Exemplo:
 *   npm run simulate:ipn -- http://localhost:3000/webhooks/nowpayments ./ipn.json
 */

import { config } from "dotenv";
config();

import axios from "axios";
import fs from "fs";
import { computeIpnSignature, IPN_SIGNATURE_HEADER } from "../src/application/services/IpnSignatureVerifier";
import { parseEnv } from "../src/config/env";
import { isJsonObject, JsonObject } from "../src/domain/types/Json";

const TARGET_URL = process.argv[2];
const PAYLOAD_FILE = process.argv[3];

if (!TARGET_URL) {
  console.error("❌ Erro: URL de destino não fornecida");
  console.log("\n💡 Uso:");
  console.log("   npm run simulate:ipn -- <url> [payload.json]");
  process.exit(1);
}

const samplePayload = (): JsonObject => ({
  payment_id: Date.now(),
  payment_status: "finished",
  pay_address: "sample-pay-address",
  price_amount: 10,
  price_currency: "usd",
  pay_amount: "0.00025",
  actually_paid: "0.00025",
  pay_currency: "btc",
  order_id: `test-ipn-${Date.now()}`,
  order_description: "Simulated IPN",
  outcome_amount: "0.00024",
  outcome_currency: "btc",
  updated_at: Date.now(),
});

const loadPayload = (file: string | undefined): JsonObject => {
  if (!file) return samplePayload();

  const parsed: unknown = JSON.parse(fs.readFileSync(file, "utf8"));
  if (!isJsonObject(parsed)) {
    throw new Error(`${file} must contain a JSON object`);
  }
  return parsed;
};

async function main(url: string): Promise<void> {
  const env = parseEnv();
  if (!env.NOWPAYMENTS_IPN_SECRET) {
    console.error("❌ NOWPAYMENTS_IPN_SECRET não configurado");
    process.exit(1);
  }

  const payload = loadPayload(PAYLOAD_FILE);
  const signature = computeIpnSignature(env.NOWPAYMENTS_IPN_SECRET, payload);

  console.log("═".repeat(60));
  console.log("🧪 Simular IPN NOWPayments\n");
  console.log(`   URL: ${url}`);
  console.log(`   payment_id: ${String(payload.payment_id)}`);
  console.log(`   Signature: ${signature.substring(0, 32)}...\n`);

  const response = await axios.post(url, payload, {
    headers: {
      "Content-Type": "application/json",
      [IPN_SIGNATURE_HEADER]: signature,
    },
    validateStatus: () => true,
  });

  if (response.status >= 200 && response.status < 300) {
    console.log(`✅ IPN entregue (status ${response.status})`);
  } else {
    console.log(`⚠️  Status inesperado: ${response.status}`);
    console.log(`   Resposta: ${JSON.stringify(response.data, null, 2)}`);
    process.exitCode = 1;
  }
}

main(TARGET_URL).catch((error: unknown) => {
  const msg = error instanceof Error ? error.message : "Erro desconhecido";
  console.error(`❌ Erro ao enviar IPN: ${msg}`);
  process.exit(1);
});
