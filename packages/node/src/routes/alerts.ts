/**
 * Alert routes.
 *
 * GET  /api/v1/alerts                   — List alerts (status filter, cursor pagination)
 * GET  /api/v1/alerts/:id
 * POST /api/v1/alerts/:id/acknowledge
 * POST /api/v1/alerts/:id/resolve
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { ListAlertsQuerySchema, ResolveAlertSchema } from "../types/dto.js";
import { paginate } from "../types/pagination.js";
import { validateBody } from "../middleware/validate.js";
import { requireCapability } from "../middleware/auth.js";
import { parseId, parseQuery } from "./params.js";

export function createAlertRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/", (c) => {
    const query = parseQuery(ListAlertsQuerySchema, c.req.query());
    const alerts = c.get("registry").listAlerts(query.status);
    return c.json(paginate(alerts, query, (alert) => alert.id, "id"));
  });

  routes.get("/:id", (c) => {
    return c.json({ data: c.get("registry").getAlert(parseId(c.req.param("id"))) });
  });

  routes.post("/:id/acknowledge", requireCapability("operations"), (c) => {
    const alert = c
      .get("registry")
      .acknowledgeAlert(parseId(c.req.param("id")), c.get("auth").identity);
    return c.json({ data: alert });
  });

  routes.post(
    "/:id/resolve",
    requireCapability("operations"),
    validateBody(ResolveAlertSchema),
    (c) => {
      const alert = c
        .get("registry")
        .resolveAlert(
          parseId(c.req.param("id")),
          c.get("auth").identity,
          c.get("validatedBody").resolutionNote,
        );
      return c.json({ data: alert });
    },
  );

  return routes;
}
