/**
 * @circulation/contract — Canonical API contract definitions.
 *
 * Exports route contracts, envelope helpers, and the contract registry.
 */

// Core types
export type { ContractRoute, HttpMethod } from './define-route.js';
export { defineRoute } from './define-route.js';

// Envelope helpers
export { DataEnvelope, ErrorEnvelope } from './envelope.js';

// Route contracts & registry
export { contract, circulationRoutes } from './routes/index.js';

// Re-export schemas that consumers may need for type inference
export {
  LoanApiSchema,
  type LoanApi,
  CopyApiSchema,
  type CopyApi,
  CirculationBodySchema,
  type CirculationBody,
} from './routes/circulation.js';
