/**
 * Result Formatter
 *
 * Projects internal field names onto the external key contract. Every key
 * is always present; missing values become "".
 */

import type { InternalFields } from "../types";

export const EXTERNAL_FIELD_KEYS = [
  "Address",
  "Google Maps Link",
  "Lot Number",
  "Borough",
  "Year of construction",
  "Total Building SF",
  "Google Maps Building SF",
  "Land SF",
  "Ceiling Height",
  "Docks",
  "Column Distance",
  "Amps",
  "Owner Name",
  "Tax Assessment",
  "Property Type",
  "Zoning",
  "Account Number",
  "Matricule",
] as const;

export type ExternalFieldKey = (typeof EXTERNAL_FIELD_KEYS)[number];

export type ExternalFields = Record<ExternalFieldKey, string>;

export function googleMapsLink(address: string): string {
  return address ? `https://maps.google.com/maps?q=${encodeURIComponent(address)}` : "";
}

export function format(internal: Readonly<InternalFields>): ExternalFields {
  const value = (name: keyof InternalFields): string => internal[name]?.trim() ?? "";
  const address = value("address");

  return {
    "Address": address,
    "Google Maps Link": googleMapsLink(address),
    "Lot Number": value("lot_number"),
    "Borough": value("borough") || value("municipality"),
    "Year of construction": value("year_of_construction"),
    "Total Building SF": value("total_building_sf"),
    "Google Maps Building SF": value("total_building_sf"),
    "Land SF": value("land_sf"),
    "Ceiling Height": value("ceiling_height"),
    "Docks": value("docks"),
    "Column Distance": value("column_distance"),
    "Amps": value("amps"),
    "Owner Name": value("owner_name"),
    "Tax Assessment": value("tax_assessment"),
    "Property Type": value("property_type"),
    "Zoning": value("zoning"),
    "Account Number": value("account_number"),
    "Matricule": value("matricule"),
  };
}

