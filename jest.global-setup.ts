const ensureTestEnvironment = (): void => {
  // NODE_ENV deve ser "test" durante o Jest (logger fica em "silent")
  process.env.NODE_ENV = "test";

  if (!process.env.NOWPAYMENTS_IPN_SECRET) {
    process.env.NOWPAYMENTS_IPN_SECRET = "test-secret";
  }
};

export default async function globalSetup(): Promise<void> {
  ensureTestEnvironment();
}
