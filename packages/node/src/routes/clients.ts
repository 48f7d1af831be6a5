/**
 * Client routes.
 *
 * POST /api/v1/clients                — Register a client
 * GET  /api/v1/clients                — List clients (cursor pagination)
 * GET  /api/v1/clients/:id            — Get a single client
 * GET  /api/v1/clients/:id/contracts  — Contracts of a client
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { PaginationQuerySchema, RegisterClientSchema } from "../types/dto.js";
import { paginate } from "../types/pagination.js";
import { validateBody } from "../middleware/validate.js";
import { requireCapability } from "../middleware/auth.js";
import { parseId, parseQuery } from "./params.js";

export function createClientRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.post(
    "/",
    requireCapability("registration"),
    validateBody(RegisterClientSchema),
    (c) => {
      const body = c.get("validatedBody");
      const client = c
        .get("registry")
        .registerClient(body.name, body.ownerRef, c.get("auth").identity);
      return c.json({ data: client }, 201);
    },
  );

  routes.get("/", (c) => {
    const query = parseQuery(PaginationQuerySchema, c.req.query());
    return c.json(
      paginate(c.get("registry").listClients(), query, (client) => client.id, "id"),
    );
  });

  routes.get("/:id", (c) => {
    return c.json({ data: c.get("registry").getClient(parseId(c.req.param("id"))) });
  });

  routes.get("/:id/contracts", (c) => {
    const registry = c.get("registry");
    const ids = registry.getClientContracts(parseId(c.req.param("id")));
    return c.json({ data: ids.map((id) => registry.getContract(id)) });
  });

  return routes;
}
