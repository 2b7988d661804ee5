// =============================================================================
// ROUTE INDEX: Aggregates all domain routes into a single array
// =============================================================================

import type { Route } from "../route.js";
import { accountRoutes } from "./account-routes.js";
import { healthRoutes } from "./health-routes.js";
import { transferRoutes } from "./transfer-routes.js";

export const routes: Route[] = [...healthRoutes, ...accountRoutes, ...transferRoutes];
