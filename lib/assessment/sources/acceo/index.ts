/**
 * Acceo Source
 *
 * Re-exports and auto-registration.
 */

export * from "./constants";
export { createAcceoStrategy, isAcceoDetailPage } from "./strategy";

// Auto-register the strategy
import { registerNavigationStrategy } from "../../registry";
import { createAcceoStrategy } from "./strategy";

registerNavigationStrategy("ACCEO_GENERIC", createAcceoStrategy);
