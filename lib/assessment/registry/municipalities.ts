/**
 * Municipality Profiles
 *
 * Registration order is significant: `resolve()` returns the first profile
 * whose key matches.
 */

import type { MunicipalityProfile } from "../types";

const ACCEO_SEARCH_BASE =
  "https://e-services.acceo.com/immosoft/controller/ImmoNetPub/U4051/trouverParAdresse?init_mapping=&language=fr";

function acceo(key: string, displayName: string, supplierSeq: number): MunicipalityProfile {
  return {
    key,
    displayName,
    searchUrl: `${ACCEO_SEARCH_BASE}&fourn_seq=${supplierSeq}`,
    requiresRotation: true,
    detailNavigationStrategy: "ACCEO_GENERIC",
  };
}

function portal(key: string, displayName: string, searchUrl: string): MunicipalityProfile {
  return {
    key,
    displayName,
    searchUrl,
    requiresRotation: true,
    detailNavigationStrategy: "ACCEO_GENERIC",
  };
}

export const MUNICIPALITY_PROFILES: readonly MunicipalityProfile[] = Object.freeze([
  acceo("laval", "Laval", 173),
  {
    key: "montreal",
    displayName: "Montréal",
    searchUrl: "https://montreal.ca/role-evaluation-fonciere/lot-renove",
    requiresRotation: false,
    detailNavigationStrategy: "MONTREAL",
  },
  portal("longueuil", "Longueuil", "https://servicesenligne.longueuil.quebec.ca/SIL/"),
  portal("gatineau", "Gatineau", "https://role.gatineau.ca/rolfoncier/"),
  portal(
    "sherbrooke",
    "Sherbrooke",
    "https://www.ville.sherbrooke.qc.ca/services-municipaux/evaluation-fonciere/"
  ),
  portal("saguenay", "Saguenay", "https://saguenay.ca/services-aux-citoyens/evaluation-fonciere"),
  portal(
    "levis",
    "Lévis",
    "https://www.ville.levis.qc.ca/citoyens/services-en-ligne/evaluation-municipale/"
  ),
  portal("quebec", "Québec", "https://www.ville.quebec.qc.ca/services/evaluation_fonciere/"),
  acceo("drummondville", "Drummondville", 224),
  acceo("saint-eustache", "Saint-Eustache", 431),
  acceo("vaudreuil-dorion", "Vaudreuil-Dorion", 523),
  acceo("mascouche", "Mascouche", 301),
  acceo("bois-des-filion", "Bois-des-Filion", 195),
]);

export const DEFAULT_MUNICIPALITY_KEY = "laval";
