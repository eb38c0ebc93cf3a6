/**
 * Golden Extraction Cases for the Montréal roll
 */

import type { GoldenExtractionCase } from "../../../testing/golden";

export const montrealGoldenCases: GoldenExtractionCase[] = [
  {
    id: "montreal-warehouse-1",
    name: "Warehouse unit in Lachine",
    fixturePath: "./fixtures/detail.html",
    expect: {
      address: "2555 Rue Alphonse-Gariépy",
      owner_name: "Entrepôts Gariépy inc.",
      year_of_construction: "1975",
      total_building_sf: "4500",
      land_sf: "12 345,6",
      tax_assessment: "3 250 000",
      property_type: "Entreposage",
      account_number: "19 - F00803000",
      matricule: "8836-93-9194-6-000-0000",
      borough: "Lachine",
    },
  },
  {
    id: "montreal-commercial-cards-1",
    name: "Card layout with classed and data-labelled values",
    fixturePath: "./fixtures/detail-cards.html",
    expect: {
      address: "4200 Boulevard Saint-Laurent",
      owner_name: "Société Laurentienne ltée",
      year_of_construction: "1928",
      total_building_sf: "2310",
      land_sf: "845,2",
      tax_assessment: "4 120 000",
      property_type: "Commerce",
      account_number: "12 - A00451000",
      matricule: "9941-23-4567-8-000-0000",
      borough: "Le Plateau-Mont-Royal",
    },
  },
];
