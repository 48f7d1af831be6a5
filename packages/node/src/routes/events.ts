/**
 * Signal log routes.
 *
 * GET /api/v1/events            — All signals (cursor pagination)
 * GET /api/v1/events/:streamId  — Signals of one stream, e.g. `sla-3`
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { paginate } from "../types/pagination.js";
import { ListEventsQuerySchema, ListStreamEventsQuerySchema } from "../types/dto.js";
import { parseQuery } from "./params.js";

export function createEventRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/", (c) => {
    const query = parseQuery(ListEventsQuerySchema, c.req.query());
    const events = c
      .get("registry")
      .events.readAll(
        query.afterPosition !== undefined ? { fromPosition: query.afterPosition + 1 } : undefined,
      );

    return c.json(paginate(events, query, (e) => e.globalPosition, "globalPosition"));
  });

  routes.get("/:streamId", (c) => {
    const query = parseQuery(ListStreamEventsQuerySchema, c.req.query());
    const events = c
      .get("registry")
      .events.read(
        c.req.param("streamId"),
        query.afterVersion !== undefined ? { fromVersion: query.afterVersion + 1 } : undefined,
      );

    return c.json(paginate(events, query, (e) => e.version, "version"));
  });

  return routes;
}
