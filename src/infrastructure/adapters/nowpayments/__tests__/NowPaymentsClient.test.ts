/**
 * Testes unitários: NowPaymentsClient
 *
 * Cada endpoint monta o RequestSpec esperado e mapeia a resposta pelo schema.
 */

import { beforeEach, describe, expect, it } from "@jest/globals";
import { InvalidRequestSpecError, NowPaymentsError } from "../../../../domain/errors/NowPaymentsError";
import { JsonValue } from "../../../../domain/types/Json";
import { RequestDispatcherPort, RequestSpec } from "../../../../ports/RequestDispatcherPort";
import { NowPaymentsClient } from "../NowPaymentsClient";

class FakeDispatcher implements RequestDispatcherPort {
  readonly specs: RequestSpec[] = [];
  response: JsonValue = {};
  failure: Error | undefined;

  async execute(spec: RequestSpec): Promise<JsonValue> {
    this.specs.push(spec);
    if (this.failure) {
      throw this.failure;
    }
    return this.response;
  }

  get lastSpec(): RequestSpec | undefined {
    return this.specs[this.specs.length - 1];
  }
}

const silentLogger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};

describe("NowPaymentsClient", () => {
  let dispatcher: FakeDispatcher;
  let client: NowPaymentsClient;

  beforeEach(() => {
    dispatcher = new FakeDispatcher();
    client = new NowPaymentsClient(dispatcher, silentLogger);
  });

  describe("general", () => {
    it("getStatus", async () => {
      dispatcher.response = { message: "OK" };

      await expect(client.getStatus()).resolves.toEqual({ message: "OK" });
      expect(dispatcher.lastSpec).toEqual({ method: "GET", path: "/status" });
    });

    it("getCurrencies e getMerchantCurrencies devolvem a lista", async () => {
      dispatcher.response = { currencies: ["btc", "eth"] };

      await expect(client.getCurrencies()).resolves.toEqual(["btc", "eth"]);
      await expect(client.getMerchantCurrencies()).resolves.toEqual(["btc", "eth"]);
      expect(dispatcher.specs.map((spec) => spec.path)).toEqual(["/currencies", "/merchant/coins"]);
    });

    it("getCurrencies aceita lista ausente", async () => {
      dispatcher.response = {};

      await expect(client.getCurrencies()).resolves.toEqual([]);
    });

    it("getFullCurrencies aplica defaults por moeda", async () => {
      dispatcher.response = { currencies: [{ currency: "btc", name: "Bitcoin", min_amount: 0.0001 }] };

      await expect(client.getFullCurrencies()).resolves.toEqual([
        { currency: "btc", name: "Bitcoin", min_amount: "0.0001", enabled: true, networks: [] },
      ]);
    });

    it("getMinAmount envia as moedas na query", async () => {
      dispatcher.response = { currency_from: "btc", currency_to: "usd", min_amount: 0.0002, fiat_equivalent: 5.5 };

      await expect(client.getMinAmount("btc", "usd")).resolves.toEqual({
        currency_from: "btc",
        currency_to: "usd",
        min_amount: "0.0002",
        fiat_equivalent: "5.5",
      });
      expect(dispatcher.lastSpec).toEqual({
        method: "GET",
        path: "/min-amount",
        query: { currency_from: "btc", currency_to: "usd" },
      });
    });

    it("getEstimate envia amount como string", async () => {
      dispatcher.response = { amount_from: 100, currency_from: "usd", currency_to: "btc", estimated_amount: "0.0025" };

      await expect(client.getEstimate({ amount: 100, currency_from: "usd", currency_to: "btc" })).resolves.toEqual({
        amount_from: "100",
        currency_from: "usd",
        currency_to: "btc",
        estimated_amount: "0.0025",
      });
      expect(dispatcher.lastSpec?.query).toEqual({ amount: "100", currency_from: "usd", currency_to: "btc" });
    });
  });

  describe("payments", () => {
    const paymentResponse = {
      payment_id: "5077125051",
      payment_status: "waiting",
      pay_address: "sample-address",
      price_amount: 10,
      price_currency: "usd",
      pay_amount: 0.00025,
      pay_currency: "btc",
      order_id: "order-1",
      created_at: "2024-03-01T12:00:00.000Z",
      updated_at: null,
      unknown_field: "dropped",
    };

    it("createPayment omite opcionais ausentes e normaliza a resposta", async () => {
      dispatcher.response = paymentResponse;

      const payment = await client.createPayment({
        price_amount: 10,
        price_currency: "usd",
        pay_currency: "btc",
        order_id: "order-1",
      });

      expect(dispatcher.lastSpec).toEqual({
        method: "POST",
        path: "/payment",
        body: { price_amount: "10", price_currency: "usd", pay_currency: "btc", order_id: "order-1" },
      });
      expect(payment).toEqual({
        payment_id: 5077125051,
        payment_status: "waiting",
        pay_address: "sample-address",
        price_amount: "10",
        price_currency: "usd",
        pay_amount: "0.00025",
        pay_currency: "btc",
        order_id: "order-1",
        created_at: new Date("2024-03-01T12:00:00.000Z"),
      });
    });

    it("getPaymentStatus codifica o id no path", async () => {
      dispatcher.response = paymentResponse;

      await client.getPaymentStatus("a/b");

      expect(dispatcher.lastSpec).toEqual({ method: "GET", path: "/payment/a%2Fb" });
    });

    it("listPayments renomeia date_from/date_to", async () => {
      dispatcher.response = { data: [], total: 0 };

      await expect(
        client.listPayments({ limit: 10, date_from: "2024-01-01", date_to: "2024-01-31" })
      ).resolves.toEqual({ data: [], total: 0 });
      expect(dispatcher.lastSpec?.query).toEqual({ limit: 10, dateFrom: "2024-01-01", dateTo: "2024-01-31" });
    });

    it("updatePaymentEstimate", async () => {
      dispatcher.response = paymentResponse;

      await client.updatePaymentEstimate(42);

      expect(dispatcher.lastSpec).toEqual({ method: "POST", path: "/payment/42/update-merchant-estimate" });
    });

    it("resposta fora do formato vira generic", async () => {
      dispatcher.response = { payment_status: "waiting" };

      const error = await client.getPaymentStatus(1).catch((reason: unknown) => reason);

      expect(error).toBeInstanceOf(NowPaymentsError);
      expect(error).toMatchObject({
        kind: "generic",
        message: "Unexpected response from /payment/1",
        responseData: { payment_status: "waiting" },
      });
    });
  });

  describe("invoices", () => {
    it("createInvoice usa id como fallback de invoice_id", async () => {
      dispatcher.response = { id: 4522625843, invoice_url: "https://nowpayments.test/payment/?iid=4522625843" };

      await expect(
        client.createInvoice({ price_amount: "25.5", price_currency: "usd", order_id: "inv-1" })
      ).resolves.toEqual({
        invoice_id: "4522625843",
        invoice_url: "https://nowpayments.test/payment/?iid=4522625843",
      });
      expect(dispatcher.lastSpec?.body).toEqual({ price_amount: "25.5", price_currency: "usd", order_id: "inv-1" });
    });

    it("createInvoicePayment envia invoice_id como iid", async () => {
      dispatcher.response = { payment_id: 1, payment_status: "waiting" };

      await client.createInvoicePayment({ invoice_id: "4522625843", pay_currency: "btc" });

      expect(dispatcher.lastSpec).toEqual({
        method: "POST",
        path: "/invoice-payment",
        body: { iid: "4522625843", pay_currency: "btc" },
      });
    });
  });

  describe("subscriptions", () => {
    it("createSubscriptionPlan desembrulha result", async () => {
      dispatcher.response = { result: { id: 76215585, title: "Monthly", interval_day: "30", amount: 9.99 } };

      await expect(
        client.createSubscriptionPlan({ title: "Monthly", interval_day: 30, amount: 9.99, currency: "usd" })
      ).resolves.toEqual({ id: "76215585", title: "Monthly", interval_day: 30, amount: "9.99" });
      expect(dispatcher.lastSpec?.body).toEqual({ title: "Monthly", interval_day: 30, amount: "9.99", currency: "usd" });
    });

    it("updateSubscriptionPlan envia só os campos alterados", async () => {
      dispatcher.response = { id: "7", interval_day: 7 };

      await client.updateSubscriptionPlan("7", { title: "Weekly" });

      expect(dispatcher.lastSpec).toEqual({ method: "PATCH", path: "/subscriptions/plans/7", body: { title: "Weekly" } });
    });

    it("listSubscriptionPlans lê plans", async () => {
      dispatcher.response = { plans: [{ id: 1, title: "A" }, { plan_id: 2, title: "B" }] };

      await expect(client.listSubscriptionPlans()).resolves.toEqual([
        { id: "1", title: "A", interval_day: 0 },
        { id: "2", title: "B", interval_day: 0 },
      ]);
    });

    it("deleteSubscription retorna true no sucesso", async () => {
      await expect(client.deleteSubscription("sub-1")).resolves.toBe(true);
      expect(dispatcher.lastSpec).toEqual({ method: "DELETE", path: "/subscriptions/sub-1" });
    });

    it("deleteSubscription retorna false em erro da API", async () => {
      dispatcher.failure = new NowPaymentsError({ kind: "subscription", message: "not found", statusCode: 404 });

      await expect(client.deleteSubscription("sub-1")).resolves.toBe(false);
    });

    it("deleteSubscription propaga erros de programação", async () => {
      const failure = new InvalidRequestSpecError("Request path must be a non-empty string");
      dispatcher.failure = failure;

      await expect(client.deleteSubscription("sub-1")).rejects.toBe(failure);
    });
  });

  describe("payouts", () => {
    it("createPayout envia o token como Bearer", async () => {
      dispatcher.response = {
        id: "5000000713",
        withdrawals: [{ id: "5000000000", address: "addr-1", currency: "btc", amount: "0.1", status: "WAITING" }],
      };

      const batch = await client.createPayout(
        { withdrawals: [{ address: "addr-1", currency: "btc", amount: 0.1 }] },
        "test-token"
      );

      expect(dispatcher.lastSpec).toEqual({
        method: "POST",
        path: "/payout",
        body: { withdrawals: [{ address: "addr-1", currency: "btc", amount: 0.1 }] },
        headers: { Authorization: "Bearer test-token" },
      });
      expect(batch).toEqual({
        batch_id: "5000000713",
        withdrawals: [{ id: "5000000000", address: "addr-1", currency: "btc", amount: "0.1", status: "WAITING" }],
      });
    });

    it("verifyPayout envia o código", async () => {
      dispatcher.response = { id: "b-1" };

      await client.verifyPayout("b-1", "123456");

      expect(dispatcher.lastSpec).toEqual({ method: "POST", path: "/payout/b-1/verify", body: { code: "123456" } });
    });

    it("validateAddress", async () => {
      dispatcher.response = {};

      await expect(client.validateAddress({ address: "addr-1", currency: "btc" })).resolves.toEqual({ result: false });
      expect(dispatcher.lastSpec?.path).toBe("/payout/validate-address");
    });
  });

  describe("custody", () => {
    it("getUserBalance", async () => {
      dispatcher.response = { user_id: "111394288", balance: [{ currency: "usdttrc20", amount: 0.7 }] };

      await expect(client.getUserBalance(111394288)).resolves.toEqual({
        user_id: 111394288,
        balance: [{ currency: "usdttrc20", amount: 0.7 }],
      });
      expect(dispatcher.lastSpec?.path).toBe("/sub-partner/balance/111394288");
    });

    it("createUserPayment normaliza para o formato de pagamento", async () => {
      dispatcher.response = { payment_id: 9, status: "waiting", amount: 50, currency: "usdttrc20", track_id: "t-1" };

      await expect(
        client.createUserPayment({ user_id: 111394288, currency: "usdttrc20", amount: 50 })
      ).resolves.toEqual({
        payment_id: 9,
        payment_status: "waiting",
        price_amount: "50",
        price_currency: "usdttrc20",
        pay_amount: "50",
        pay_currency: "usdttrc20",
        order_id: "t-1",
      });
      expect(dispatcher.lastSpec?.body).toEqual({ user_id: 111394288, currency: "usdttrc20", amount: "50" });
    });

    it("listTransfers envia user_id como id", async () => {
      dispatcher.response = { result: [] };

      await client.listTransfers({ user_id: 5, limit: 20 });

      expect(dispatcher.lastSpec?.query).toEqual({ id: 5, limit: 20 });
    });

    it("transferFunds usa id como fallback de transfer_id", async () => {
      dispatcher.response = { id: 327209161, status: "CREATED", amount: 0.3 };

      await expect(
        client.transferFunds({ from_id: 1, to_id: 2, currency: "trx", amount: 0.3 })
      ).resolves.toEqual({ transfer_id: "327209161", status: "CREATED", amount: "0.3" });
    });
  });

  describe("conversion", () => {
    it("createConversion", async () => {
      dispatcher.response = { id: "c-1", status: "WAITING", from_amount: "50" };

      await expect(
        client.createConversion({ from_currency: "usdttrc20", to_currency: "usdterc20", amount: 50 })
      ).resolves.toEqual({ conversion_id: "c-1", status: "WAITING", from_amount: "50" });
      expect(dispatcher.lastSpec?.body).toEqual({ from_currency: "usdttrc20", to_currency: "usdterc20", amount: "50" });
    });

    it("listConversions", async () => {
      dispatcher.response = { result: [], count: 0 };

      await expect(client.listConversions({ limit: 10 })).resolves.toEqual({ result: [], count: 0 });
      expect(dispatcher.lastSpec).toEqual({ method: "GET", path: "/conversion", query: { limit: 10 } });
    });
  });
});
