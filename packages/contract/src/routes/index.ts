/**
 * Contract registry — aggregates all route contracts.
 */

export { circulationRoutes } from './circulation.js';

import { circulationRoutes } from './circulation.js';

/** The full contract registry. */
export const contract = {
  circulation: circulationRoutes,
} as const;
