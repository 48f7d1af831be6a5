/**
 * SLA routes.
 *
 * GET   /api/v1/slas               — List SLAs (status filter, cursor pagination)
 * GET   /api/v1/slas/:id
 * POST  /api/v1/slas/:id/metrics   — Report an observation
 * POST  /api/v1/slas/:id/pause
 * POST  /api/v1/slas/:id/resume
 * PATCH /api/v1/slas/:id/target
 * PATCH /api/v1/slas/:id/params    — Comparator and window
 * GET   /api/v1/slas/:id/alerts
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import {
  ListSlasQuerySchema,
  ReportMetricSchema,
  StatusChangeSchema,
  UpdateParamsSchema,
  UpdateTargetSchema,
} from "../types/dto.js";
import { paginate } from "../types/pagination.js";
import { validateBody } from "../middleware/validate.js";
import { requireCapability } from "../middleware/auth.js";
import { parseId, parseQuery } from "./params.js";

export function createSlaRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/", (c) => {
    const query = parseQuery(ListSlasQuerySchema, c.req.query());
    const slas = c.get("registry").listSlas(query.status);
    return c.json(paginate(slas, query, (sla) => sla.id, "id"));
  });

  routes.get("/:id", (c) => {
    return c.json({ data: c.get("registry").getSla(parseId(c.req.param("id"))) });
  });

  // ─── Evaluation ──────────────────────────────────────────────────

  routes.post(
    "/:id/metrics",
    requireCapability("registration"),
    validateBody(ReportMetricSchema),
    (c) => {
      const body = c.get("validatedBody");
      const outcome = c
        .get("registry")
        .reportMetric(parseId(c.req.param("id")), body.observed, body.note, c.get("auth").identity);
      return c.json({ data: outcome });
    },
  );

  // ─── Novelties ───────────────────────────────────────────────────

  routes.post(
    "/:id/pause",
    requireCapability("novelties"),
    validateBody(StatusChangeSchema),
    (c) => {
      const sla = c
        .get("registry")
        .pauseSla(parseId(c.req.param("id")), c.get("validatedBody").reason, c.get("auth").identity);
      return c.json({ data: sla });
    },
  );

  routes.post(
    "/:id/resume",
    requireCapability("novelties"),
    validateBody(StatusChangeSchema),
    (c) => {
      const sla = c
        .get("registry")
        .resumeSla(parseId(c.req.param("id")), c.get("validatedBody").reason, c.get("auth").identity);
      return c.json({ data: sla });
    },
  );

  routes.patch(
    "/:id/target",
    requireCapability("novelties"),
    validateBody(UpdateTargetSchema),
    (c) => {
      const body = c.get("validatedBody");
      const sla = c
        .get("registry")
        .updateSlaTarget(parseId(c.req.param("id")), body.target, body.reason, c.get("auth").identity);
      return c.json({ data: sla });
    },
  );

  routes.patch(
    "/:id/params",
    requireCapability("novelties"),
    validateBody(UpdateParamsSchema),
    (c) => {
      const { reason, ...params } = c.get("validatedBody");
      const sla = c
        .get("registry")
        .updateSlaParams(parseId(c.req.param("id")), params, reason, c.get("auth").identity);
      return c.json({ data: sla });
    },
  );

  routes.get("/:id/alerts", (c) => {
    const registry = c.get("registry");
    const ids = registry.getSlaAlerts(parseId(c.req.param("id")));
    return c.json({ data: ids.map((id) => registry.getAlert(id)) });
  });

  return routes;
}
