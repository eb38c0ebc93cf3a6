/**
 * API Schemas for the Scrape Entry Point
 */

import { z } from "zod";
import { EXTERNAL_FIELD_KEYS } from "../format/result-formatter";

// ============================================================================
// Scrape Request
// ============================================================================

export const lotNumberSchema = z
  .string()
  .trim()
  .regex(/^\d[\d\s]*$/, "Lot number must contain only digits")
  .transform((value) => value.replace(/\s+/g, ""));

export const scrapeRequestSchema = z.object({
  lotNumber: lotNumberSchema,
  municipality: z.string().trim().min(1, "Municipality is required"),
  useRotation: z.boolean().default(false),
  /** Left unset, the configured PLAYWRIGHT_HEADLESS applies. */
  headless: z.boolean().optional(),
});

// ============================================================================
// Response Types
// ============================================================================

const externalFieldsShape = Object.fromEntries(EXTERNAL_FIELD_KEYS.map((key) => [key, z.string()]));

export const externalFieldsSchema = z.object(externalFieldsShape).strict();

export const scrapeResponseSchema = z.object({
  runId: z.string().uuid(),
  fields: externalFieldsSchema,
  succeeded: z.boolean(),
  source: z.enum(["LIVE", "FALLBACK"]),
  error: z.string().optional(),
  diagnostic: z.string().optional(),
});
