/**
 * Request/Response DTOs with Zod validation schemas.
 *
 * Each DTO has a Zod schema and a derived TypeScript type.
 * Route handlers use these for body/query validation.
 */

import { z } from "zod";

// =============================================================================
// Shared Schemas
// =============================================================================

export const PaginationQuerySchema = z.object({
  cursor: z.string().optional(),
  limit: z.coerce.number().int().min(1).max(100).default(20),
});

export const ComparatorSchema = z.enum(["LT", "LE", "EQ", "NE", "GE", "GT"]);

/** Entity ids arrive as path segments. */
export const IdParamSchema = z.coerce.number().int().positive().max(Number.MAX_SAFE_INTEGER);

const SafeInt = z.number().int().min(Number.MIN_SAFE_INTEGER).max(Number.MAX_SAFE_INTEGER);
const Timestamp = z.string().datetime({ offset: true });
const Reason = z.string().min(1).max(1024);

// =============================================================================
// Registration DTOs
// =============================================================================

export const RegisterClientSchema = z.object({
  name: z.string().min(1).max(256),
  ownerRef: z.string().min(1).max(256),
});

export type RegisterClientDto = z.infer<typeof RegisterClientSchema>;

export const SlaDefinitionSchema = z.object({
  name: z.string().min(1).max(256),
  description: z.string().max(2048).optional(),
  target: SafeInt,
  comparator: ComparatorSchema,
  windowSeconds: SafeInt.min(0).optional(),
});

export type SlaDefinitionDto = z.infer<typeof SlaDefinitionSchema>;

export const CreateContractSchema = z.object({
  clientId: SafeInt.positive(),
  documentRef: z.string().min(1).max(1024),
  externalId: z.string().min(1).max(128).optional(),
  startAt: Timestamp.optional(),
  endAt: Timestamp.optional(),
  slas: z.array(SlaDefinitionSchema).max(100).default([]),
});

export type CreateContractDto = z.infer<typeof CreateContractSchema>;

export const UpdateDocumentSchema = z.object({
  documentRef: z.string().min(1).max(1024),
});

export type UpdateDocumentDto = z.infer<typeof UpdateDocumentSchema>;

// =============================================================================
// Evaluation DTOs
// =============================================================================

export const ReportMetricSchema = z.object({
  observed: SafeInt,
  note: z.string().max(1024).default(""),
});

export type ReportMetricDto = z.infer<typeof ReportMetricSchema>;

// =============================================================================
// Novelty DTOs
// =============================================================================

export const StatusChangeSchema = z.object({
  reason: Reason,
});

export type StatusChangeDto = z.infer<typeof StatusChangeSchema>;

export const UpdateTargetSchema = z.object({
  target: SafeInt,
  reason: Reason,
});

export type UpdateTargetDto = z.infer<typeof UpdateTargetSchema>;

export const UpdateParamsSchema = z.object({
  comparator: ComparatorSchema,
  windowSeconds: SafeInt.min(0),
  reason: Reason,
});

export type UpdateParamsDto = z.infer<typeof UpdateParamsSchema>;

// =============================================================================
// Alert DTOs
// =============================================================================

export const ResolveAlertSchema = z.object({
  resolutionNote: z.string().min(1).max(2048),
});

export type ResolveAlertDto = z.infer<typeof ResolveAlertSchema>;

// =============================================================================
// List Queries
// =============================================================================

export const ListSlasQuerySchema = PaginationQuerySchema.extend({
  status: z.enum(["active", "paused", "archived"]).optional(),
});

export type ListSlasQuery = z.infer<typeof ListSlasQuerySchema>;

export const ListAlertsQuerySchema = PaginationQuerySchema.extend({
  status: z.enum(["open", "acknowledged", "resolved"]).optional(),
});

export type ListAlertsQuery = z.infer<typeof ListAlertsQuerySchema>;

export const ListEventsQuerySchema = PaginationQuerySchema.extend({
  afterPosition: z.coerce.number().int().min(0).optional(),
});

export type ListEventsQuery = z.infer<typeof ListEventsQuerySchema>;

export const ListStreamEventsQuerySchema = PaginationQuerySchema.extend({
  afterVersion: z.coerce.number().int().min(0).optional(),
});

export type ListStreamEventsQuery = z.infer<typeof ListStreamEventsQuerySchema>;
