/**
 * Type barrel — re-exports all public types from @sla-registry/node.
 */

// DTOs
export {
  PaginationQuerySchema,
  ComparatorSchema,
  IdParamSchema,
  RegisterClientSchema,
  SlaDefinitionSchema,
  CreateContractSchema,
  UpdateDocumentSchema,
  ReportMetricSchema,
  StatusChangeSchema,
  UpdateTargetSchema,
  UpdateParamsSchema,
  ResolveAlertSchema,
  ListSlasQuerySchema,
  ListAlertsQuerySchema,
  ListEventsQuerySchema,
  ListStreamEventsQuerySchema,
} from "./dto.js";
export type {
  RegisterClientDto,
  SlaDefinitionDto,
  CreateContractDto,
  UpdateDocumentDto,
  ReportMetricDto,
  StatusChangeDto,
  UpdateTargetDto,
  UpdateParamsDto,
  ResolveAlertDto,
  ListSlasQuery,
  ListAlertsQuery,
  ListEventsQuery,
  ListStreamEventsQuery,
} from "./dto.js";

// Error
export { createErrorEnvelope } from "./error.js";
export type { ApiErrorCode, ErrorDetail, ErrorEnvelope } from "./error.js";

// Pagination
export { encodeCursor, decodeCursor, paginate } from "./pagination.js";
export type {
  PaginationQuery,
  PaginationMeta,
  PaginatedResponse,
} from "./pagination.js";

// Auth
export { ROLES, ROLE_CAPABILITIES, isRole, hasCapability } from "./auth.js";
export type { Role, AuthContext, ApiKeyRecord, JwtClaims } from "./auth.js";

// App env
export type { AppEnv, BodyEnv } from "./api-contract.js";
