/**
 * Montréal Source
 *
 * Re-exports and auto-registration.
 */

export * from "./constants";
export { createMontrealStrategy, isMontrealDetailPage } from "./strategy";

// Auto-register the strategy
import { registerNavigationStrategy } from "../../registry";
import { createMontrealStrategy } from "./strategy";

registerNavigationStrategy("MONTREAL", createMontrealStrategy);
