/**
 * Montréal Assessment Roll Constants
 */

import {
  label,
  labelledLine,
  labelledNumber,
  pattern,
  selector,
  type FieldSpecTable,
} from "../../extraction/field-spec";

export const MONTREAL_RESULT_ACTION = "/role-evaluation-fonciere/lot-renove/liste/resultat";

export const LOT_INPUT_SELECTORS = [
  "input[name='lotNumber']",
  "input[name='lot']",
  "input[id*='lot' i]",
  "input[placeholder*='lot' i]",
  "input[placeholder*='numéro' i]",
  "input[type='search']",
  "input[type='text']",
] as const;

export const SUBMIT_SELECTORS = [
  "form button[type='submit']",
  "form input[type='submit']",
  ".search-btn",
  ".btn-search",
] as const;

/** Result cards post a hidden evalUnitId to the result endpoint. */
export const RESULT_ENTRY_SELECTORS = [
  `form[action*='${MONTREAL_RESULT_ACTION}']`,
  `li:has(form[action*='${MONTREAL_RESULT_ACTION}'])`,
  "article",
  "li",
  "table tr",
] as const;

export const NO_RESULTS_PHRASES = [
  "aucun résultat",
  "aucune unité d'évaluation",
  "no results",
] as const;

/** Headings only the detail page of a unit shows. */
export const DETAIL_PAGE_MARKERS = [
  "aire d'étage",
  "superficie du terrain",
  "année de construction",
] as const;

export const MONTREAL_FIELDS: FieldSpecTable = {
  address: [
    selector(".adresse", "[data-label*='adresse' i]"),
    label("Adresse municipale", "Adresse"),
    labelledLine("Adresse municipale"),
  ],
  owner_name: [
    selector(".proprietaire", "[data-label*='propriétaire' i]"),
    label("Propriétaire", "Nom du propriétaire"),
    labelledLine("Propriétaire"),
  ],
  year_of_construction: [
    selector(".annee_construction", "[data-label*='construction' i]"),
    pattern("Année de construction[ \\t]*[:\\-]?[ \\t]*(?<value>\\d{4})"),
    label("Année de construction"),
  ],
  total_building_sf: [
    selector(".aire_etage", "[data-label*='étage' i]"),
    labelledNumber("Aire d'étage"),
    label("Aire d'étage"),
  ],
  land_sf: [
    selector(".superficie_terrain", "[data-label*='terrain' i]"),
    labelledNumber("Superficie du terrain"),
    label("Superficie du terrain"),
  ],
  tax_assessment: [
    selector(".valeur_immeuble", "[data-label*='valeur' i]"),
    labelledNumber("Valeur de l'immeuble", "Valeur d'évaluation"),
    label("Valeur de l'immeuble", "Valeur d'évaluation"),
  ],
  property_type: [
    selector(".utilisation", "[data-label*='utilisation' i]"),
    label("Utilisation prédominante", "Usage", "Utilisation"),
    labelledLine("Utilisation prédominante", "Usage"),
  ],
  account_number: [
    selector(".compte_foncier", "[data-label*='compte foncier' i]"),
    label("Numéro de compte foncier"),
    labelledLine("Numéro de compte foncier"),
  ],
  matricule: [
    selector(".matricule", "[data-label*='matricule' i]"),
    label("Numéro de matricule", "Matricule"),
    labelledLine("Numéro de matricule"),
  ],
  borough: [
    selector(".arrondissement", "[data-label*='arrondissement' i]"),
    label("Arrondissement"),
    labelledLine("Arrondissement"),
  ],
};
