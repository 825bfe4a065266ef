// Market HTTP helpers: caller identity, capability handles, error mapping.
//
// Identity comes from `x-actor-address` unless the server is wired with its
// own resolver. Capabilities travel as vault handles in `x-capability`.

import type { FastifyReply, FastifyRequest } from "fastify";
import { ZodError } from "zod";

import { errorGroupOf, isMarketError, type MarketErrorCode } from "../../market/errors.v1";

export type ActorResolver = (req: FastifyRequest) => string | null;

function headerValue(req: FastifyRequest, name: string): string | null {
  const raw = req.headers[name];
  const v = Array.isArray(raw) ? raw[0] : raw;
  return typeof v === "string" && v.trim().length > 0 ? v.trim() : null;
}

export function requireActorAddress(
  req: FastifyRequest,
  reply: FastifyReply,
  getActorAddress?: ActorResolver
): string | null {
  const actor = getActorAddress ? getActorAddress(req) : null;
  const address = actor ?? headerValue(req, "x-actor-address");
  if (!address) {
    reply.code(401).send({ ok: false, error: "UNAUTHORIZED", message: "Missing actor address (provide x-actor-address header or wire auth)." });
    return null;
  }
  return address;
}

export function capabilityHandle(req: FastifyRequest): string | null {
  return headerValue(req, "x-capability");
}

export function statusForMarketError(code: MarketErrorCode): number {
  if (code === "DuplicateGameId") return 409;
  if (code === "IndexOutOfRange") return 400;
  switch (errorGroupOf(code)) {
    case "identity":
      return 404;
    case "authorization":
      return 403;
    case "funds":
      return 402;
    case "policy":
      return 422;
  }
}

function hasStatusCode(e: Error): e is Error & { statusCode: number } {
  return "statusCode" in e && typeof e.statusCode === "number";
}

export function handleRouteError(error: Error, req: FastifyRequest, reply: FastifyReply) {
  if (isMarketError(error)) {
    req.log.info({ code: error.code }, "market operation rejected");
    return reply.code(statusForMarketError(error.code)).send({ ok: false, error: error.code, message: error.message });
  }
  if (error instanceof ZodError) {
    return reply.code(400).send({
      ok: false,
      error: "BAD_REQUEST",
      message: error.issues.map((i) => `${i.path.join(".") || "body"}: ${i.message}`).join("; "),
    });
  }
  if (hasStatusCode(error) && error.statusCode < 500) {
    return reply.code(error.statusCode).send({ ok: false, error: "BAD_REQUEST", message: error.message });
  }

  req.log.error({ err: error }, "unhandled route error");
  return reply.code(500).send({ ok: false, error: "INTERNAL", message: "Internal error" });
}
