import { NextFunction, Request, RequestHandler, Response } from "express";
import { IpnSignatureVerifier } from "../../../application/services/IpnSignatureVerifier";
import { logger as defaultLogger, Logger } from "../../logger";

/**
 * Bloqueia IPNs sem assinatura válida. Requer body já parseado (express.json()).
 */
export const requireValidIpnSignature = (
  verifier: IpnSignatureVerifier,
  logger: Logger = defaultLogger
): RequestHandler => {
  return (req: Request, res: Response, next: NextFunction) => {
    const body: unknown = req.body;
    if (!verifier.verifyRequest(body, req.headers)) {
      logger.warn({
        type: "NOWPAYMENTS_IPN_INVALID_SIGNATURE",
        message: "Rejected IPN with missing or invalid signature",
        payload: { path: req.path, ip: req.ip },
      });
      res.status(401).json({ error: "INVALID_SIGNATURE" });
      return;
    }

    next();
  };
};
