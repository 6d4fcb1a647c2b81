import crypto from "node:crypto";
import type { Logger } from "../types/logger";

const HEX_PATTERN = /^(?:[0-9a-fA-F]{2})+$/;
const ED25519_PUBLIC_KEY_BYTES = 32;
const ED25519_SIGNATURE_BYTES = 64;

export function verifySignature(
  signatureHex: string | undefined,
  timestamp: string | undefined,
  rawBody: string,
  publicKeyHex: string
): boolean {
  if (!signatureHex || !timestamp) {
    return false;
  }

  const signature = decodeHex(signatureHex.trim(), ED25519_SIGNATURE_BYTES);
  const keyBytes = decodeHex(publicKeyHex.trim(), ED25519_PUBLIC_KEY_BYTES);

  if (!signature || !keyBytes) {
    return false;
  }

  try {
    const key = crypto.createPublicKey({
      key: { kty: "OKP", crv: "Ed25519", x: keyBytes.toString("base64url") },
      format: "jwk"
    });
    const message = Buffer.from(`${timestamp}${rawBody}`, "utf8");

    return crypto.verify(null, message, key, signature);
  } catch {
    return false;
  }
}

export type RequestVerifier = (
  signatureHex: string | undefined,
  timestamp: string | undefined,
  rawBody: string
) => boolean;

/**
 * Builds the verifier used by the webhook route.
 *
 * Without a public key every request is let through and a warning is logged
 * for each one. Production configuration refuses to start without a key.
 */
export function createRequestVerifier(
  publicKeyHex: string | undefined,
  logger: Logger
): RequestVerifier {
  if (!publicKeyHex) {
    logger.warn(
      "DISCORD_PUBLIC_KEY is not set: webhook signature verification is DISABLED (development only)"
    );

    return (signatureHex, timestamp) => {
      if (!signatureHex || !timestamp) {
        return false;
      }
      logger.warn("Accepting webhook without signature verification (insecure passthrough)");
      return true;
    };
  }

  return (signatureHex, timestamp, rawBody) =>
    verifySignature(signatureHex, timestamp, rawBody, publicKeyHex);
}

function decodeHex(value: string, expectedBytes: number): Buffer | null {
  if (!HEX_PATTERN.test(value)) {
    return null;
  }

  const bytes = Buffer.from(value, "hex");
  return bytes.length === expectedBytes ? bytes : null;
}
