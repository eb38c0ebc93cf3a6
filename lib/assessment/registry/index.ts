/**
 * Municipality Registry & Dispatcher
 *
 * Resolves free-form municipality names to a profile and routes each
 * profile to the navigation strategy registered for its dialect.
 */

import type { DetailNavigationStrategyKind, MunicipalityProfile } from "../types";
import type { NavigationStrategy } from "../navigation/types";
import { municipalityKey } from "../utils/text";
import { DEFAULT_MUNICIPALITY_KEY, MUNICIPALITY_PROFILES } from "./municipalities";

// ============================================================================
// Registry State
// ============================================================================

const strategyFactories = new Map<DetailNavigationStrategyKind, () => NavigationStrategy>();
const strategyInstances = new Map<DetailNavigationStrategyKind, NavigationStrategy>();

// ============================================================================
// Profiles
// ============================================================================

/**
 * List all registered municipality profiles in registration order.
 */
export function listMunicipalities(): readonly MunicipalityProfile[] {
  return MUNICIPALITY_PROFILES;
}

export function getDefaultProfile(): MunicipalityProfile {
  const profile = MUNICIPALITY_PROFILES.find((p) => p.key === DEFAULT_MUNICIPALITY_KEY);
  if (!profile) {
    throw new Error(`Default municipality profile missing: ${DEFAULT_MUNICIPALITY_KEY}`);
  }
  return profile;
}

/**
 * Resolve a municipality name to its profile.
 *
 * Matching ignores case, accents and punctuation, and succeeds when either
 * side contains the other. Unknown or empty names fall back to the default
 * Acceo profile; the scrape then fails downstream with an explicit cause.
 */
export function resolve(name: string): MunicipalityProfile {
  const query = municipalityKey(name);
  if (!query) {
    return getDefaultProfile();
  }

  const match = MUNICIPALITY_PROFILES.find((profile) => {
    const key = municipalityKey(profile.key);
    return query.includes(key) || key.includes(query);
  });

  if (!match) {
    console.log(`[Registry] No profile for "${name}", using ${DEFAULT_MUNICIPALITY_KEY}`);
    return getDefaultProfile();
  }
  return match;
}

// ============================================================================
// Strategies
// ============================================================================

/**
 * Register a navigation strategy factory for a dialect.
 * Called at module initialization time by each source.
 */
export function registerNavigationStrategy(
  kind: DetailNavigationStrategyKind,
  factory: () => NavigationStrategy
): void {
  strategyFactories.set(kind, factory);
  strategyInstances.delete(kind);
}

export function hasNavigationStrategy(kind: DetailNavigationStrategyKind): boolean {
  return strategyFactories.has(kind);
}

/**
 * Get the navigation strategy for a profile's dialect.
 * Creates the strategy on first access (lazy instantiation).
 */
export function dispatch(profile: MunicipalityProfile): NavigationStrategy {
  const kind = profile.detailNavigationStrategy;

  let strategy = strategyInstances.get(kind);
  if (strategy) {
    return strategy;
  }

  const factory = strategyFactories.get(kind);
  if (!factory) {
    throw new Error(`No navigation strategy registered for ${kind}`);
  }

  strategy = factory();
  strategyInstances.set(kind, strategy);
  return strategy;
}
