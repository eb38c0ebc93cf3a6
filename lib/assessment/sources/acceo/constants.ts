/**
 * Acceo Immosoft Constants
 *
 * Shared by every municipality whose roll is published through the Acceo
 * e-services platform, and used as the best-effort dialect for the other
 * municipal portals.
 */

import {
  label,
  labelledLine,
  labelledNumber,
  pattern,
  selector,
  type FieldSpecTable,
} from "../../extraction/field-spec";

/** The search page opens on the address tab; the cadastre tab has the lot field. */
export const CADASTRE_TAB_TEXT = "Par cadastre";

export const CADASTRE_TAB_SELECTORS = [
  "#par-cadastre",
  ".cadastre-btn",
  "a[href*='cadastre' i]",
  "button[onclick*='cadastre' i]",
] as const;

export const EVALUATION_REPORT_RADIO = "#ty_rapport_eval";

export const LOT_INPUT_SELECTORS = [
  "#NoCadastre",
  "input[name='NoCadastre']",
  "input[id*='cadastre' i]",
  "input[name*='cadastre' i]",
  "input[name*='lot' i]",
  "input[placeholder*='lot' i]",
  "input[type='text']",
] as const;

export const SUBMIT_SELECTORS = [
  "#btnSearch",
  "button[type='submit']",
  "input[type='submit']",
  ".btn-search",
  ".rechercher",
  "input[value*='Rechercher']",
] as const;

export const RESULT_ENTRY_SELECTORS = ["table tr", ".resultat", ".result", "li"] as const;

export const NO_RESULTS_PHRASES = [
  "aucun résultat",
  "aucune propriété",
  "aucun dossier",
  "no results found",
] as const;

/** Section headings of a property's roll extract. */
export const DETAIL_PAGE_MARKERS = [
  "identification de l'unité d'évaluation",
  "caractéristiques du bâtiment",
  "valeurs au rôle",
] as const;

export const ACCEO_FIELDS: FieldSpecTable = {
  address: [
    selector(".adresse", "[data-field='address']", "[data-label*='adresse' i]"),
    label("Adresse", "Adresse municipale"),
    labelledLine("Adresse"),
  ],
  owner_name: [
    selector(".proprietaire", "[data-field='owner']", "[data-label*='propriétaire' i]"),
    label("Nom", "Propriétaire", "Nom du propriétaire"),
    labelledLine("Propriétaire"),
  ],
  year_of_construction: [
    selector(".annee_construction", "[data-field='year']", "[data-label*='construction' i]"),
    pattern("Année de construction[ \\t]*[:\\-]?[ \\t]*(?<value>\\d{4})"),
    label("Année de construction"),
  ],
  total_building_sf: [
    selector(".superficie_batiment", "[data-field='building_sf']", "[data-label*='étage' i]"),
    labelledNumber("Aire d'étages", "Aire d'étage", "Superficie du bâtiment"),
    label("Aire d'étages", "Aire d'étage"),
  ],
  land_sf: [
    selector(".superficie_terrain", "[data-field='land_sf']", "[data-label*='terrain' i]"),
    labelledNumber("Superficie du terrain", "Superficie"),
    label("Superficie du terrain", "Superficie"),
  ],
  tax_assessment: [
    selector(".valeur_immeuble", "[data-field='assessment']", "[data-label*='valeur' i]"),
    labelledNumber("Valeur de l'immeuble", "Valeur totale", "Valeur d'évaluation"),
    label("Valeur de l'immeuble", "Valeur totale"),
  ],
  property_type: [
    selector(".type_propriete", "[data-field='type']", "[data-label*='utilisation' i]"),
    label("Utilisation prédominante", "Utilisation"),
    labelledLine("Utilisation prédominante"),
  ],
  account_number: [
    selector(".numero_compte", "[data-label*='compte' i]"),
    label("Numéro de compte", "Dossier no"),
    labelledLine("Numéro de compte"),
  ],
  matricule: [
    selector(".matricule", "[data-label*='matricule' i]"),
    label("Matricule", "Numéro matricule"),
    labelledLine("Matricule"),
  ],
  borough: [
    selector(".arrondissement", "[data-label*='arrondissement' i]"),
    label("Arrondissement"),
    labelledLine("Arrondissement"),
  ],
};
