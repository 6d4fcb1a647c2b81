import type { FastifyInstance, FastifyReply, FastifyRequest } from "fastify";
import { decodeWebhookBody, type WebhookEventRouter } from "../services/webhookEvents";
import type { Logger } from "../types/logger";
import type { RequestVerifier } from "../utils/verifySignature";

export const SIGNATURE_HEADER = "x-signature-ed25519";
export const TIMESTAMP_HEADER = "x-signature-timestamp";
export const LIVENESS_TEXT = "Webhook Server - OK";

const CORS_HEADERS = {
  "access-control-allow-origin": "*",
  "access-control-allow-methods": "POST, GET, OPTIONS",
  "access-control-allow-headers": "Content-Type, X-Signature-Ed25519, X-Signature-Timestamp"
};

// Any path is accepted; Discord only lets the app configure one URL.
const ROUTE_PATHS = ["/", "/*"];

type WebhookRouteDeps = {
  logger: Logger;
  verify: RequestVerifier;
  router: WebhookEventRouter;
};

export function registerWebhookRoutes(
  app: FastifyInstance,
  deps: WebhookRouteDeps
): void {
  // Keep bodies as raw text: the signature covers the exact bytes, and
  // decoding must not happen before verification.
  app.removeAllContentTypeParsers();
  app.addContentTypeParser("*", { parseAs: "string" }, (_request, body, done) => {
    done(null, body);
  });

  for (const url of ROUTE_PATHS) {
    app.post(url, (request, reply) => handleWebhook(request, reply, deps));

    app.get(url, async (_request, reply) =>
      reply.code(200).type("text/plain").send(LIVENESS_TEXT)
    );

    app.options(url, async (_request, reply) => reply.code(200).headers(CORS_HEADERS).send());
  }
}

async function handleWebhook(
  request: FastifyRequest,
  reply: FastifyReply,
  deps: WebhookRouteDeps
): Promise<FastifyReply> {
  try {
    const signature = readHeader(request, SIGNATURE_HEADER);
    const timestamp = readHeader(request, TIMESTAMP_HEADER);

    if (!signature || !timestamp) {
      deps.logger.warn({ url: request.url }, "Webhook request missing signature headers");
      return reply.code(401).send({ error: "Missing signature" });
    }

    const rawBody = typeof request.body === "string" ? request.body : "";

    if (!deps.verify(signature, timestamp, rawBody)) {
      deps.logger.warn({ url: request.url }, "Webhook signature verification failed");
      return reply.code(401).send({ error: "Invalid signature" });
    }

    const decoded = decodeWebhookBody(rawBody);

    if (decoded.kind === "bad_request") {
      deps.logger.warn({ reason: decoded.reason }, "Rejected malformed webhook payload");
      return reply.code(400).send({ error: decoded.reason });
    }

    if (decoded.kind === "ping") {
      deps.logger.info("Received PING webhook");
      // Discord checks for the header even on an empty 204.
      return reply.code(204).header("content-type", "application/json").send();
    }

    const { event } = decoded;
    deps.logger.info(
      { eventType: event.eventType, numericType: event.numericType },
      "Received webhook event"
    );

    const handled = await deps.router.route(event);

    if (!handled) {
      deps.logger.error({ eventType: event.eventType }, "Webhook event handler reported failure");
      return reply.code(500).send({ error: "Event handling failed" });
    }

    return reply.code(200).send({ received: true });
  } catch (error) {
    deps.logger.error({ error, url: request.url }, "Error handling webhook request");
    return reply.code(500).send({ error: "Internal server error" });
  }
}

function readHeader(request: FastifyRequest, name: string): string | undefined {
  const raw = request.headers[name];
  const value = Array.isArray(raw) ? raw[0] : raw;
  return value?.trim() ? value.trim() : undefined;
}
