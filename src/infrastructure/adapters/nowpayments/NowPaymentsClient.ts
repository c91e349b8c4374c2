/**
 * Cliente tipado dos endpoints da NOWPayments
 *
 * Cada método monta um RequestSpec, delega ao dispatcher (retry/classificação)
 * e valida a resposta com o schema zod correspondente.
 *
 * @maintainability Nenhuma lógica de negócio aqui: só payload e desserialização
 */

import { z } from "zod";
import { isNowPaymentsError, NowPaymentsError } from "../../../domain/errors/NowPaymentsError";
import { isJsonObject, JsonObject, JsonValue } from "../../../domain/types/Json";
import { RequestDispatcherPort, RequestSpec } from "../../../ports/RequestDispatcherPort";
import { logger as defaultLogger, Logger } from "../../logger";
import {
  AddressValidation,
  addressValidationSchema,
  ApiStatus,
  apiStatusSchema,
  Conversion,
  conversionSchema,
  Currency,
  currencyListSchema,
  Estimate,
  estimateSchema,
  fullCurrencyListSchema,
  Invoice,
  invoiceSchema,
  MinAmount,
  minAmountSchema,
  Payment,
  PayoutBatch,
  payoutBatchSchema,
  paymentSchema,
  rawObjectSchema,
  Subscription,
  SubscriptionPlan,
  subscriptionPlanListSchema,
  subscriptionPlanSchema,
  subscriptionSchema,
  Transfer,
  transferSchema,
  UserAccount,
  userAccountSchema,
  UserPayment,
  userPaymentSchema,
} from "./schemas";

/** Valor decimal; enviado à API como string para não perder precisão. */
export type Amount = number | string;

export interface EstimateInput {
  amount: Amount;
  currency_from: string;
  currency_to: string;
}

export interface CreatePaymentInput {
  price_amount: Amount;
  price_currency: string;
  pay_currency: string;
  pay_amount?: Amount;
  ipn_callback_url?: string;
  order_id?: string;
  order_description?: string;
  purchase_id?: string;
  payout_address?: string;
  payout_currency?: string;
  external_id?: string;
}

export interface ListPaymentsFilters {
  limit?: number;
  page?: number;
  order_by?: string;
  order?: "asc" | "desc";
  date_from?: string;
  date_to?: string;
  payment_status?: string;
  pay_currency?: string;
}

export interface CreateInvoiceInput {
  price_amount: Amount;
  price_currency: string;
  order_id: string;
  order_description?: string;
  ipn_callback_url?: string;
  success_url?: string;
  cancel_url?: string;
}

export interface CreateInvoicePaymentInput {
  invoice_id: string;
  pay_currency: string;
  purchase_id?: string;
  order_description?: string;
  customer_email?: string;
  payout_address?: string;
  payout_extra_id?: string;
  payout_currency?: string;
}

export interface CreateSubscriptionPlanInput {
  title: string;
  interval_day: number;
  amount: Amount;
  currency: string;
  ipn_callback_url?: string;
  success_url?: string;
  cancel_url?: string;
  partially_paid_url?: string;
}

export type UpdateSubscriptionPlanInput = Partial<CreateSubscriptionPlanInput>;

export interface CreateSubscriptionInput {
  plan_id: string;
  email: string;
  order_id?: string;
  order_description?: string;
  customer_name?: string;
  starting_day?: number;
}

export interface ListSubscriptionsFilters {
  plan_id?: string;
  status?: string;
  limit?: number;
  page?: number;
}

export interface PayoutWithdrawalRequest {
  address: string;
  currency: string;
  amount: Amount;
  extra_id?: string;
  ipn_callback_url?: string;
  fiat_amount?: Amount;
  fiat_currency?: string;
}

export interface CreatePayoutInput {
  withdrawals: PayoutWithdrawalRequest[];
  ipn_callback_url?: string;
}

export interface ListPayoutsFilters {
  batch_id?: string;
  status?: string;
  date_from?: string;
  date_to?: string;
  order_by?: string;
  order?: "asc" | "desc";
  limit?: number;
  page?: number;
}

export interface ValidateAddressInput {
  address: string;
  currency: string;
  extra_id?: string;
}

export interface CreateUserAccountInput {
  external_id?: string;
  email?: string;
}

export interface ListUserAccountsFilters {
  offset?: number;
  limit?: number;
  order?: "asc" | "desc";
  order_by?: string;
}

export interface CreateUserPaymentInput {
  user_id: number;
  currency: string;
  amount?: Amount;
  track_id?: string;
}

export interface TransferFundsInput {
  from_id: number;
  to_id: number;
  currency: string;
  amount: Amount;
}

export interface ListTransfersFilters {
  user_id?: number;
  status?: string;
  limit?: number;
  offset?: number;
  order?: "asc" | "desc";
}

export interface WithdrawFundsInput {
  user_id: number;
  currency: string;
  amount: Amount;
  address?: string;
  address_extra?: string;
  ipn_callback_url?: string;
}

export interface CreateConversionInput {
  from_currency: string;
  to_currency: string;
  amount: Amount;
}

export interface ListConversionsFilters {
  limit?: number;
  offset?: number;
}

type OptionalFields = Record<string, JsonValue | undefined>;

const compact = (fields: OptionalFields): JsonObject => {
  const body: JsonObject = {};
  for (const [key, value] of Object.entries(fields)) {
    if (value !== undefined) {
      body[key] = value;
    }
  }
  return body;
};

const toAmount = (value: Amount): string => String(value);

const optionalAmount = (value: Amount | undefined): string | undefined =>
  value === undefined ? undefined : toAmount(value);

const pathId = (id: string | number): string => encodeURIComponent(String(id));

// Algumas rotas de criação devolvem o recurso dentro de `result`
const unwrapResult = (raw: JsonValue): JsonValue =>
  isJsonObject(raw) && isJsonObject(raw.result) ? raw.result : raw;

export class NowPaymentsClient {
  constructor(
    private readonly dispatcher: RequestDispatcherPort,
    private readonly logger: Logger = defaultLogger
  ) {}

  // ============================
  // General
  // ============================

  /** Disponibilidade da API (`{ message: "OK" }`). */
  async getStatus(): Promise<ApiStatus> {
    return this.request(apiStatusSchema, { method: "GET", path: "/status" });
  }

  async getCurrencies(): Promise<string[]> {
    const list = await this.request(currencyListSchema, { method: "GET", path: "/currencies" });
    return list.currencies;
  }

  async getMerchantCurrencies(): Promise<string[]> {
    const list = await this.request(currencyListSchema, { method: "GET", path: "/merchant/coins" });
    return list.currencies;
  }

  async getFullCurrencies(): Promise<Currency[]> {
    const list = await this.request(fullCurrencyListSchema, { method: "GET", path: "/full-currencies" });
    return list.currencies;
  }

  async getMinAmount(currencyFrom: string, currencyTo: string): Promise<MinAmount> {
    return this.request(minAmountSchema, {
      method: "GET",
      path: "/min-amount",
      query: { currency_from: currencyFrom, currency_to: currencyTo },
    });
  }

  async getEstimate(input: EstimateInput): Promise<Estimate> {
    return this.request(estimateSchema, {
      method: "GET",
      path: "/estimate",
      query: {
        amount: toAmount(input.amount),
        currency_from: input.currency_from,
        currency_to: input.currency_to,
      },
    });
  }

  // ============================
  // Payments
  // ============================

  async createPayment(input: CreatePaymentInput): Promise<Payment> {
    return this.request(paymentSchema, {
      method: "POST",
      path: "/payment",
      body: compact({
        ...input,
        price_amount: toAmount(input.price_amount),
        pay_amount: optionalAmount(input.pay_amount),
      }),
    });
  }

  async getPaymentStatus(paymentId: number | string): Promise<Payment> {
    return this.request(paymentSchema, { method: "GET", path: `/payment/${pathId(paymentId)}` });
  }

  async listPayments(filters: ListPaymentsFilters = {}): Promise<JsonObject> {
    const { date_from, date_to, ...rest } = filters;
    return this.request(rawObjectSchema, {
      method: "GET",
      path: "/payment",
      query: { ...rest, dateFrom: date_from, dateTo: date_to },
    });
  }

  /** Recalcula a estimativa do pagamento com a cotação atual. */
  async updatePaymentEstimate(paymentId: number | string): Promise<Payment> {
    return this.request(paymentSchema, {
      method: "POST",
      path: `/payment/${pathId(paymentId)}/update-merchant-estimate`,
    });
  }

  // ============================
  // Invoices
  // ============================

  async createInvoice(input: CreateInvoiceInput): Promise<Invoice> {
    return this.request(invoiceSchema, {
      method: "POST",
      path: "/invoice",
      body: compact({ ...input, price_amount: toAmount(input.price_amount) }),
    });
  }

  async getInvoiceStatus(invoiceId: string): Promise<Invoice> {
    return this.request(invoiceSchema, { method: "GET", path: `/invoice/${pathId(invoiceId)}` });
  }

  async createInvoicePayment(input: CreateInvoicePaymentInput): Promise<Payment> {
    const { invoice_id, ...rest } = input;
    return this.request(paymentSchema, {
      method: "POST",
      path: "/invoice-payment",
      body: compact({ iid: invoice_id, ...rest }),
    });
  }

  // ============================
  // Subscriptions
  // ============================

  async createSubscriptionPlan(input: CreateSubscriptionPlanInput): Promise<SubscriptionPlan> {
    const spec: RequestSpec = {
      method: "POST",
      path: "/subscriptions/plans",
      body: compact({ ...input, amount: toAmount(input.amount) }),
    };
    const raw = await this.dispatcher.execute(spec);
    return this.parse(subscriptionPlanSchema, unwrapResult(raw), spec.path);
  }

  async updateSubscriptionPlan(planId: string, changes: UpdateSubscriptionPlanInput): Promise<SubscriptionPlan> {
    return this.request(subscriptionPlanSchema, {
      method: "PATCH",
      path: `/subscriptions/plans/${pathId(planId)}`,
      body: compact({ ...changes, amount: optionalAmount(changes.amount) }),
    });
  }

  async getSubscriptionPlan(planId: string): Promise<SubscriptionPlan> {
    return this.request(subscriptionPlanSchema, { method: "GET", path: `/subscriptions/plans/${pathId(planId)}` });
  }

  async listSubscriptionPlans(): Promise<SubscriptionPlan[]> {
    return this.request(subscriptionPlanListSchema, { method: "GET", path: "/subscriptions/plans" });
  }

  async createSubscription(input: CreateSubscriptionInput): Promise<Subscription> {
    return this.request(subscriptionSchema, {
      method: "POST",
      path: "/subscriptions",
      body: compact({ ...input }),
    });
  }

  async listSubscriptions(filters: ListSubscriptionsFilters = {}): Promise<JsonObject> {
    return this.request(rawObjectSchema, { method: "GET", path: "/subscriptions", query: { ...filters } });
  }

  async getSubscription(subscriptionId: string): Promise<Subscription> {
    return this.request(subscriptionSchema, { method: "GET", path: `/subscriptions/${pathId(subscriptionId)}` });
  }

  /**
   * Remove a assinatura. Erros da API viram `false`; falhas de programação
   * (RequestSpec inválido, cancelamento) continuam propagando.
   */
  async deleteSubscription(subscriptionId: string): Promise<boolean> {
    try {
      await this.dispatcher.execute({ method: "DELETE", path: `/subscriptions/${pathId(subscriptionId)}` });
      return true;
    } catch (error) {
      if (!isNowPaymentsError(error)) {
        throw error;
      }
      this.logger.warn({
        type: "NOWPAYMENTS_SUBSCRIPTION_DELETE_FAILED",
        message: "Failed to delete NOWPayments subscription",
        payload: { subscriptionId, kind: error.kind, statusCode: error.statusCode },
      });
      return false;
    }
  }

  // ============================
  // Payouts
  // ============================

  /**
   * Cria um lote de saques. `authToken` é o JWT de /auth exigido pela API de payouts.
   */
  async createPayout(input: CreatePayoutInput, authToken?: string): Promise<PayoutBatch> {
    return this.request(payoutBatchSchema, {
      method: "POST",
      path: "/payout",
      body: compact({
        withdrawals: input.withdrawals.map((withdrawal) => compact({ ...withdrawal })),
        ipn_callback_url: input.ipn_callback_url,
      }),
      headers: authToken ? { Authorization: `Bearer ${authToken}` } : undefined,
    });
  }

  /** Confirma o lote com o código 2FA. */
  async verifyPayout(batchId: string, code: string): Promise<PayoutBatch> {
    return this.request(payoutBatchSchema, {
      method: "POST",
      path: `/payout/${pathId(batchId)}/verify`,
      body: { code },
    });
  }

  async getPayoutStatus(batchId: string): Promise<PayoutBatch> {
    return this.request(payoutBatchSchema, { method: "GET", path: `/payout/${pathId(batchId)}` });
  }

  async listPayouts(filters: ListPayoutsFilters = {}): Promise<JsonObject> {
    return this.request(rawObjectSchema, { method: "GET", path: "/payout", query: { ...filters } });
  }

  async validateAddress(input: ValidateAddressInput): Promise<AddressValidation> {
    return this.request(addressValidationSchema, {
      method: "POST",
      path: "/payout/validate-address",
      body: compact({ ...input }),
    });
  }

  // ============================
  // Custody (sub-partner)
  // ============================

  async createUserAccount(input: CreateUserAccountInput = {}): Promise<UserAccount> {
    return this.request(userAccountSchema, {
      method: "POST",
      path: "/sub-partner/balance",
      body: compact({ ...input }),
    });
  }

  async getUserBalance(userId: number): Promise<UserAccount> {
    return this.request(userAccountSchema, { method: "GET", path: `/sub-partner/balance/${pathId(userId)}` });
  }

  async listUserAccounts(filters: ListUserAccountsFilters = {}): Promise<JsonObject> {
    return this.request(rawObjectSchema, { method: "GET", path: "/sub-partner", query: { ...filters } });
  }

  async createUserPayment(input: CreateUserPaymentInput): Promise<UserPayment> {
    return this.request(userPaymentSchema, {
      method: "POST",
      path: "/sub-partner/payment",
      body: compact({ ...input, amount: optionalAmount(input.amount) }),
    });
  }

  async transferFunds(input: TransferFundsInput): Promise<Transfer> {
    return this.request(transferSchema, {
      method: "POST",
      path: "/sub-partner/transfer",
      body: compact({ ...input, amount: toAmount(input.amount) }),
    });
  }

  async listTransfers(filters: ListTransfersFilters = {}): Promise<JsonObject> {
    const { user_id, ...rest } = filters;
    return this.request(rawObjectSchema, {
      method: "GET",
      path: "/sub-partner/transfers",
      query: { id: user_id, ...rest },
    });
  }

  async getTransfer(transferId: string): Promise<Transfer> {
    return this.request(transferSchema, { method: "GET", path: `/sub-partner/transfer/${pathId(transferId)}` });
  }

  async withdrawFunds(input: WithdrawFundsInput): Promise<JsonObject> {
    return this.request(rawObjectSchema, {
      method: "POST",
      path: "/sub-partner/write-off",
      body: compact({ ...input, amount: toAmount(input.amount) }),
    });
  }

  // ============================
  // Conversion
  // ============================

  async createConversion(input: CreateConversionInput): Promise<Conversion> {
    return this.request(conversionSchema, {
      method: "POST",
      path: "/conversion",
      body: compact({ ...input, amount: toAmount(input.amount) }),
    });
  }

  async getConversionStatus(conversionId: string): Promise<Conversion> {
    return this.request(conversionSchema, { method: "GET", path: `/conversion/${pathId(conversionId)}` });
  }

  async listConversions(filters: ListConversionsFilters = {}): Promise<JsonObject> {
    return this.request(rawObjectSchema, { method: "GET", path: "/conversion", query: { ...filters } });
  }

  private async request<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, spec: RequestSpec): Promise<T> {
    const raw = await this.dispatcher.execute(spec);
    return this.parse(schema, raw, spec.path);
  }

  private parse<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, raw: JsonValue, path: string): T {
    const parsed = schema.safeParse(raw);
    if (parsed.success) {
      return parsed.data;
    }

    this.logger.warn({
      type: "NOWPAYMENTS_UNEXPECTED_RESPONSE",
      message: "NOWPayments response did not match the expected shape",
      payload: { path, issues: parsed.error.issues.map((issue) => issue.path.join(".")) },
    });
    throw new NowPaymentsError({
      kind: "generic",
      message: `Unexpected response from ${path}`,
      responseData: isJsonObject(raw) ? raw : {},
      cause: parsed.error,
    });
  }
}
