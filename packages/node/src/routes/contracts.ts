/**
 * Contract routes.
 *
 * POST  /api/v1/contracts                          — Create a contract, optionally with SLAs
 * GET   /api/v1/contracts/by-external-id/:externalId
 * GET   /api/v1/contracts/:id
 * PATCH /api/v1/contracts/:id/document             — Replace the document reference
 * POST  /api/v1/contracts/:id/slas                 — Attach an SLA
 * GET   /api/v1/contracts/:id/slas
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import {
  CreateContractSchema,
  SlaDefinitionSchema,
  UpdateDocumentSchema,
} from "../types/dto.js";
import { validateBody } from "../middleware/validate.js";
import { requireCapability } from "../middleware/auth.js";
import { parseId } from "./params.js";

export function createContractRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.post(
    "/",
    requireCapability("registration"),
    validateBody(CreateContractSchema),
    (c) => {
      const { slas, ...input } = c.get("validatedBody");
      const created = c
        .get("registry")
        .createContractWithSlas(input, slas, c.get("auth").identity);
      return c.json({ data: created }, 201);
    },
  );

  routes.get("/by-external-id/:externalId", (c) => {
    const contract = c.get("registry").getContractByExternalId(c.req.param("externalId"));
    return c.json({ data: contract });
  });

  routes.get("/:id", (c) => {
    return c.json({ data: c.get("registry").getContract(parseId(c.req.param("id"))) });
  });

  routes.patch(
    "/:id/document",
    requireCapability("registration"),
    validateBody(UpdateDocumentSchema),
    (c) => {
      const contract = c
        .get("registry")
        .updateContractDocument(
          parseId(c.req.param("id")),
          c.get("validatedBody").documentRef,
          c.get("auth").identity,
        );
      return c.json({ data: contract });
    },
  );

  routes.post(
    "/:id/slas",
    requireCapability("registration"),
    validateBody(SlaDefinitionSchema),
    (c) => {
      const sla = c
        .get("registry")
        .addSla(parseId(c.req.param("id")), c.get("validatedBody"), c.get("auth").identity);
      return c.json({ data: sla }, 201);
    },
  );

  routes.get("/:id/slas", (c) => {
    const registry = c.get("registry");
    const ids = registry.getContractSlas(parseId(c.req.param("id")));
    return c.json({ data: ids.map((id) => registry.getSla(id)) });
  });

  return routes;
}
