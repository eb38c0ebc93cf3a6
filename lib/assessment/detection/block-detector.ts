/**
 * Rate-Limit / Block Detector
 *
 * Scans page content for known quota notices and bot-protection pages.
 * Content is lower-cased and accent-folded once, then each phrase is a
 * plain substring test.
 */

import { foldDiacritics } from "../utils/text";

export interface BlockPattern {
  phrase: string;
  reason: string;
}

export interface BlockDetection {
  blocked: boolean;
  reason?: string;
  phrase?: string;
}

export const DEFAULT_BLOCK_PATTERNS: readonly BlockPattern[] = [
  // Quebec portal quota notices
  {
    phrase: "l'outil gratuit est destiné à la consultation personnelle citoyenne",
    reason: "Free consultation quota notice",
  },
  { phrase: "limite de consultations gratuites", reason: "Free consultation limit reached" },
  { phrase: "accès illimité au rôle d'évaluation", reason: "Unlimited-access upsell shown" },
  { phrase: "portail de données immobilières", reason: "Redirected to property-data portal" },

  // Human verification
  { phrase: "solve this captcha", reason: "CAPTCHA detected" },
  { phrase: "complete the captcha", reason: "CAPTCHA detected" },
  { phrase: "verify you are human", reason: "Human verification required" },
  { phrase: "prove you're not a robot", reason: "Human verification required" },
  { phrase: "i'm not a robot", reason: "Human verification required" },

  // Cloudflare specific
  { phrase: "checking your browser", reason: "Cloudflare protection detected" },
  { phrase: "enable javascript and cookies", reason: "Cloudflare protection detected" },

  // Bot detection
  { phrase: "automated access", reason: "Bot detected" },
  { phrase: "unusual traffic", reason: "Bot detected" },

  // Generic
  { phrase: "too many requests", reason: "Too many requests" },
  { phrase: "rate limit", reason: "Rate limited" },
  { phrase: "access denied", reason: "Access denied" },
  { phrase: "blocked", reason: "Blocked" },
];

function foldPhrase(phrase: string): string {
  return foldDiacritics(phrase).toLowerCase();
}

export class BlockDetector {
  private readonly patterns: ReadonlyArray<BlockPattern & { folded: string }>;

  constructor(patterns: readonly BlockPattern[] = DEFAULT_BLOCK_PATTERNS) {
    this.patterns = patterns
      .filter((p) => p.phrase.trim().length > 0)
      .map((p) => ({ ...p, folded: foldPhrase(p.phrase) }));
  }

  detect(content: string): BlockDetection {
    const folded = foldDiacritics(content).toLowerCase();
    for (const { phrase, reason, folded: needle } of this.patterns) {
      if (folded.includes(needle)) {
        return { blocked: true, reason, phrase };
      }
    }
    return { blocked: false };
  }

  check(content: string): boolean {
    return this.detect(content).blocked;
  }
}

const defaultDetector = new BlockDetector();

/**
 * Detect blocking with the default phrase list.
 */
export function detectBlocking(content: string): BlockDetection {
  return defaultDetector.detect(content);
}

export function check(content: string): boolean {
  return defaultDetector.check(content);
}
