/**
 * Synthetic assessment data for tests and offline callers. Depends only on
 * the request, never on the network or the clock.
 */

import type { InternalFields } from "../types";

export function mockFields(lotNumber: string, municipality: string): InternalFields {
  return {
    lot_number: lotNumber,
    municipality,
    address: `123 Main Street, ${municipality}, QC`,
    owner_name: `Property Owner ${lotNumber.slice(-3)}`,
    year_of_construction: "1995",
    total_building_sf: "2,500",
    land_sf: "5,000",
    tax_assessment: "$450,000",
    property_type: "Residential",
  };
}
