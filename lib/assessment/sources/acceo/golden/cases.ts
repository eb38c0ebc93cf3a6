/**
 * Golden Extraction Cases for Acceo roll extracts
 */

import type { GoldenExtractionCase } from "../../../testing/golden";

export const acceoGoldenCases: GoldenExtractionCase[] = [
  {
    id: "acceo-commercial-1",
    name: "Commercial building, evaluation report",
    fixturePath: "./fixtures/detail.html",
    expect: {
      address: "1500 Boulevard Saint-Martin Ouest",
      owner_name: "Gestion Tremblay inc.",
      year_of_construction: "1988",
      total_building_sf: "1 820,5",
      land_sf: "2 450,8",
      tax_assessment: "1 275 000",
      property_type: "Immeuble commercial",
      account_number: "0012345",
      matricule: "9950-12-3456-0-000-0000",
    },
  },
  {
    id: "acceo-responsive-1",
    name: "Responsive table with labels only in data attributes",
    fixturePath: "./fixtures/detail-responsive.html",
    expect: {
      address: "75 Rue des Érables",
      owner_name: "Marie Gagnon",
      year_of_construction: "1962",
      total_building_sf: "148,6",
      land_sf: "612,4",
      tax_assessment: "398 500",
      property_type: "Logement",
      account_number: "0067890",
      matricule: "9950-44-1020-0-000-0000",
    },
  },
];
