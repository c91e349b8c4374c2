/**
 * Verificação de assinatura de IPN (Instant Payment Notification) da NOWPayments
 *
 * Mensagem assinada = JSON compacto do payload com as chaves de primeiro nível
 * ordenadas; assinatura = HMAC-SHA512 hex (minúsculo) no header x-nowpayments-sig.
 *
 * @security Comparação timing-safe; verificação nunca lança, só retorna false
 */

import crypto from "crypto";

export const IPN_SIGNATURE_HEADER = "x-nowpayments-sig";

export type IpnHeaders = Record<string, string | string[] | undefined>;

const isPlainObject = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const escapeNonAscii = (json: string): string =>
  json.replace(/[\u007f-\uffff]/g, (char) => `\\u${char.charCodeAt(0).toString(16).padStart(4, "0")}`);

const compareCodePoints = (left: string, right: string): number => {
  const a = Array.from(left, (char) => char.codePointAt(0) ?? 0);
  const b = Array.from(right, (char) => char.codePointAt(0) ?? 0);
  for (let i = 0; i < Math.min(a.length, b.length); i++) {
    if (a[i] !== b[i]) return a[i] - b[i];
  }
  return a.length - b.length;
};

/**
 * Serializa o payload no formato assinado pela NOWPayments.
 *
 * Só o primeiro nível é ordenado (por code point); objetos aninhados saem na
 * ordem em que estão. A string é montada à mão porque objetos JS enumeram
 * chaves numéricas antes das demais. Tudo fora de ASCII imprimível vira
 * `\uXXXX` minúsculo, com pares substitutos para caracteres fora do BMP.
 *
 * @throws {TypeError} payload não é objeto ou contém valor sem representação JSON
 */
export const canonicalizeIpnPayload = (payload: unknown): string => {
  if (!isPlainObject(payload)) {
    throw new TypeError("IPN payload must be a JSON object");
  }

  const members = Object.keys(payload)
    .sort(compareCodePoints)
    .map((key) => {
      const serialized: string | undefined = JSON.stringify(payload[key]);
      if (serialized === undefined) {
        throw new TypeError(`IPN payload field "${key}" is not JSON-serializable`);
      }
      return `${JSON.stringify(key)}:${serialized}`;
    });

  return escapeNonAscii(`{${members.join(",")}}`);
};

export const computeIpnSignature = (secret: string, payload: unknown): string =>
  crypto.createHmac("sha512", secret).update(canonicalizeIpnPayload(payload), "utf8").digest("hex");

export const verifySignature = (secret: string, payload: unknown, signature: unknown): boolean => {
  if (typeof signature !== "string" || signature.length === 0) {
    return false;
  }
  try {
    const expected = Buffer.from(computeIpnSignature(secret, payload), "utf8");
    const provided = Buffer.from(signature, "utf8");
    if (expected.length !== provided.length) {
      return false;
    }
    return crypto.timingSafeEqual(expected, provided);
  } catch {
    // Payload malformado e assinatura inválida têm o mesmo destino: rejeitar
    return false;
  }
};

export const findSignatureHeader = (headers: IpnHeaders): string | undefined => {
  const entry = Object.entries(headers).find(([name]) => name.toLowerCase() === IPN_SIGNATURE_HEADER);
  const value = entry?.[1];
  return Array.isArray(value) ? value[0] : value;
};

export class IpnSignatureVerifier {
  constructor(private readonly ipnSecret: string) {}

  verifySignature(payload: unknown, signature: unknown): boolean {
    return verifySignature(this.ipnSecret, payload, signature);
  }

  verifyRequest(payload: unknown, headers: IpnHeaders): boolean {
    const signature = findSignatureHeader(headers);
    if (!signature) {
      return false;
    }
    return this.verifySignature(payload, signature);
  }
}
