export { runNavigation, NavigationFailure } from "./state-machine";
export type { NavigationContext, NavigationResult, NavigationStrategy } from "./types";
