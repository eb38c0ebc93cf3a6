/**
 * Assessment Scraper Types
 *
 * Core type definitions shared across the lot assessment scraper.
 */

// ============================================================================
// Requests
// ============================================================================

export interface ScrapeRequest {
  readonly lotNumber: string;
  readonly municipality: string;
  readonly useRotation: boolean;
  readonly headless: boolean;
}

// ============================================================================
// Municipality Profiles
// ============================================================================

export type DetailNavigationStrategyKind = "MONTREAL" | "ACCEO_GENERIC";

export interface MunicipalityProfile {
  key: string;
  displayName: string;
  searchUrl: string;
  requiresRotation: boolean;
  detailNavigationStrategy: DetailNavigationStrategyKind;
}

// ============================================================================
// Internal Fields
// ============================================================================

/**
 * Logical fields produced by extraction. The request's lot number and
 * municipality are always added on top of whatever the page yields.
 */
export const EXTRACTED_FIELDS = [
  "address",
  "owner_name",
  "year_of_construction",
  "total_building_sf",
  "land_sf",
  "tax_assessment",
  "property_type",
  "account_number",
  "matricule",
  "borough",
] as const;

export type ExtractedFieldName = (typeof EXTRACTED_FIELDS)[number];

export type InternalFieldName =
  | ExtractedFieldName
  | "lot_number"
  | "municipality"
  | "ceiling_height"
  | "docks"
  | "column_distance"
  | "amps"
  | "zoning";

export type InternalFields = Partial<Record<InternalFieldName, string>>;

// ============================================================================
// Extraction Result
// ============================================================================

export type ExtractionSource = "LIVE" | "FALLBACK";

export interface ExtractionResult {
  readonly fields: Readonly<InternalFields>;
  readonly source: ExtractionSource;
  readonly succeeded: boolean;
  readonly diagnostic?: string;
}

// ============================================================================
// Navigation
// ============================================================================

export type NavigationStage = "SEARCH" | "RESULTS" | "DETAIL" | "DONE" | "BLOCKED" | "FAILED";

export interface NavigationOutcome {
  currentStage: NavigationStage;
  blocked: boolean;
  lastUrl: string;
}

// ============================================================================
// Egress
// ============================================================================

export type ProvisioningState = "STOPPED" | "STARTING" | "READY";

export interface EgressEndpoint {
  readonly id: string;
  readonly networkRegion: string;
  provisioningState: ProvisioningState;
  address?: string;
}
