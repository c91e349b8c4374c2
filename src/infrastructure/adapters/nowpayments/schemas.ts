/**
 * Schemas zod das respostas da NOWPayments.
 *
 * Valores monetários viram string decimal (nunca number arredondado), datas
 * inválidas ou ausentes viram undefined e campos desconhecidos são descartados.
 */

import { z } from "zod";
import { JsonObject, JsonValue } from "../../../domain/types/Json";

export const parseTimestamp = (value: string | null | undefined): Date | undefined => {
  if (!value) return undefined;
  const date = new Date(value);
  return Number.isNaN(date.getTime()) ? undefined : date;
};

const jsonValue: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([z.string(), z.number(), z.boolean(), z.null(), z.array(jsonValue), z.record(jsonValue)])
);
const jsonObject: z.ZodType<JsonObject> = z.record(jsonValue);

const decimal = z.union([z.string(), z.number()]).transform((value) => String(value));
const optionalDecimal = decimal.nullish().transform((value) => value ?? undefined);
const optionalString = z.string().nullish().transform((value) => value ?? undefined);
const timestamp = z.string().nullish().transform(parseTimestamp);

const identifier = z.union([z.string(), z.number()]).transform((value) => String(value));
const optionalIdentifier = identifier.nullish().transform((value) => value ?? undefined);
const numericId = z.union([z.number().int(), z.string().regex(/^\d+$/).transform(Number)]);
const optionalNumericId = numericId.nullish().transform((value) => value ?? undefined);

// ============================
// General
// ============================
export const apiStatusSchema = z.object({
  message: z.string(),
});

export const currencyListSchema = z.object({
  currencies: z.array(z.string()).nullish().transform((value) => value ?? []),
});

export const currencySchema = z.object({
  currency: z.string(),
  name: optionalString,
  min_amount: optionalDecimal,
  max_amount: optionalDecimal,
  enabled: z.boolean().nullish().transform((value) => value ?? true),
  networks: z.array(z.string()).nullish().transform((value) => value ?? []),
});

export const fullCurrencyListSchema = z.object({
  currencies: z.array(currencySchema).nullish().transform((value) => value ?? []),
});

export const minAmountSchema = z.object({
  currency_from: z.string(),
  currency_to: z.string(),
  min_amount: decimal,
  fiat_equivalent: optionalDecimal,
});

export const estimateSchema = z.object({
  amount_from: decimal,
  currency_from: z.string(),
  currency_to: z.string(),
  estimated_amount: decimal,
});

// ============================
// Payments & Invoices
// ============================
export const paymentSchema = z.object({
  payment_id: numericId,
  payment_status: z.string(),
  pay_address: optionalString,
  price_amount: optionalDecimal,
  price_currency: optionalString,
  pay_amount: optionalDecimal,
  pay_currency: optionalString,
  order_id: optionalString,
  order_description: optionalString,
  purchase_id: optionalIdentifier,
  created_at: timestamp,
  updated_at: timestamp,
  outcome_amount: optionalDecimal,
  outcome_currency: optionalString,
  actually_paid: optionalDecimal,
  commission_fee: optionalDecimal,
  payin_extra_id: optionalString,
  ipn_callback_url: optionalString,
  payout_address: optionalString,
  payout_currency: optionalString,
  external_id: optionalString,
  expire_at: timestamp,
});

// /sub-partner/payment usa outros nomes de campo; normalizamos para Payment
export const userPaymentSchema = z
  .object({
    payment_id: numericId,
    status: z.string(),
    pay_address: optionalString,
    amount: optionalDecimal,
    currency: optionalString,
    track_id: optionalString,
    created_at: timestamp,
    updated_at: timestamp,
  })
  .transform((raw) => ({
    payment_id: raw.payment_id,
    payment_status: raw.status,
    pay_address: raw.pay_address,
    price_amount: raw.amount,
    price_currency: raw.currency,
    pay_amount: raw.amount,
    pay_currency: raw.currency,
    order_id: raw.track_id,
    created_at: raw.created_at,
    updated_at: raw.updated_at,
  }));

export const invoiceSchema = z
  .object({
    invoice_id: optionalIdentifier,
    id: optionalIdentifier,
    invoice_url: optionalString,
    order_id: optionalString,
    price_amount: optionalDecimal,
    price_currency: optionalString,
    invoice_status: optionalString,
    pay_currency: optionalString,
    pay_amount: optionalDecimal,
    payment_id: optionalNumericId,
    created_at: timestamp,
    updated_at: timestamp,
  })
  .transform(({ id, invoice_id, ...rest }) => ({ ...rest, invoice_id: invoice_id ?? id }));

// ============================
// Subscriptions
// ============================
export const subscriptionPlanSchema = z
  .object({
    id: optionalIdentifier,
    plan_id: optionalIdentifier,
    title: optionalString,
    interval_day: z.coerce.number().int().nullish().transform((value) => value ?? 0),
    amount: optionalDecimal,
    currency: optionalString,
    ipn_callback_url: optionalString,
    success_url: optionalString,
    cancel_url: optionalString,
    partially_paid_url: optionalString,
    created_at: timestamp,
    updated_at: timestamp,
  })
  .transform(({ id, plan_id, ...rest }) => ({ ...rest, id: id ?? plan_id }));

export const subscriptionPlanListSchema = z
  .object({
    plans: z.array(subscriptionPlanSchema).optional(),
    result: z.array(subscriptionPlanSchema).optional(),
  })
  .transform(({ plans, result }) => plans ?? result ?? []);

export const subscriptionSchema = z.object({
  subscription_id: optionalIdentifier,
  plan_id: optionalIdentifier,
  email: optionalString,
  status: optionalString,
  order_id: optionalString,
  order_description: optionalString,
  next_payment_date: timestamp,
  created_at: timestamp,
  last_payment_date: timestamp,
  last_payment: jsonObject.nullish().transform((value) => value ?? undefined),
});

// ============================
// Payouts
// ============================
export const payoutWithdrawalSchema = z.object({
  id: identifier,
  address: optionalString,
  currency: optionalString,
  amount: optionalDecimal,
  status: optionalString,
  ipn_callback_url: optionalString,
  fiat_amount: optionalDecimal,
  fiat_currency: optionalString,
  txid: optionalString,
  finished_at: timestamp,
});

export const payoutBatchSchema = z
  .object({
    batch_id: optionalIdentifier,
    id: optionalIdentifier,
    status: optionalString,
    withdrawals: z.array(payoutWithdrawalSchema).nullish().transform((value) => value ?? []),
    total_amount: optionalDecimal,
    total_currency: optionalString,
    created_at: timestamp,
    updated_at: timestamp,
    verified_at: timestamp,
    ipn_callback_url: optionalString,
  })
  .transform(({ id, batch_id, ...rest }) => ({ ...rest, batch_id: batch_id ?? id }));

export const addressValidationSchema = z.object({
  address: optionalString,
  currency: optionalString,
  result: z.boolean().nullish().transform((value) => value ?? false),
  message: optionalString,
  extra_id: optionalString,
});

// ============================
// Custody (sub-partner)
// ============================
export const userAccountSchema = z.object({
  user_id: numericId,
  external_id: optionalString,
  email: optionalString,
  balance: z.array(jsonObject).nullish().transform((value) => value ?? []),
  created_at: timestamp,
});

export const transferSchema = z
  .object({
    transfer_id: optionalIdentifier,
    id: optionalIdentifier,
    from_id: optionalNumericId,
    to_id: optionalNumericId,
    currency: optionalString,
    amount: optionalDecimal,
    status: optionalString,
    created_at: timestamp,
    completed_at: timestamp,
  })
  .transform(({ id, transfer_id, ...rest }) => ({ ...rest, transfer_id: transfer_id ?? id }));

// ============================
// Conversion
// ============================
export const conversionSchema = z
  .object({
    conversion_id: optionalIdentifier,
    id: optionalIdentifier,
    from_currency: optionalString,
    to_currency: optionalString,
    from_amount: optionalDecimal,
    to_amount: optionalDecimal,
    status: optionalString,
    rate: optionalDecimal,
    created_at: timestamp,
    completed_at: timestamp,
  })
  .transform(({ id, conversion_id, ...rest }) => ({ ...rest, conversion_id: conversion_id ?? id }));

export const rawObjectSchema = jsonObject;

export type ApiStatus = z.output<typeof apiStatusSchema>;
export type Currency = z.output<typeof currencySchema>;
export type MinAmount = z.output<typeof minAmountSchema>;
export type Estimate = z.output<typeof estimateSchema>;
export type Payment = z.output<typeof paymentSchema>;
export type UserPayment = z.output<typeof userPaymentSchema>;
export type Invoice = z.output<typeof invoiceSchema>;
export type SubscriptionPlan = z.output<typeof subscriptionPlanSchema>;
export type Subscription = z.output<typeof subscriptionSchema>;
export type PayoutWithdrawal = z.output<typeof payoutWithdrawalSchema>;
export type PayoutBatch = z.output<typeof payoutBatchSchema>;
export type AddressValidation = z.output<typeof addressValidationSchema>;
export type UserAccount = z.output<typeof userAccountSchema>;
export type Transfer = z.output<typeof transferSchema>;
export type Conversion = z.output<typeof conversionSchema>;
