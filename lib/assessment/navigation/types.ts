/**
 * Navigation Types
 */

import type { NavigationTimings } from "../config";
import type { BlockDetector } from "../detection/block-detector";
import type { FieldSpecTable } from "../extraction/field-spec";
import type { PageSnapshot } from "../extraction/page-text";
import type { ScrapeObserver } from "../observability/types";
import type { PageDriver } from "../session/page-driver";
import type {
  DetailNavigationStrategyKind,
  InternalFields,
  MunicipalityProfile,
  NavigationOutcome,
} from "../types";
import type { Deadline } from "../utils/timing";

export interface NavigationContext {
  readonly runId: string;
  readonly driver: PageDriver;
  readonly profile: MunicipalityProfile;
  readonly lotNumber: string;
  readonly timings: NavigationTimings;
  readonly randomizedTiming: boolean;
  readonly detector: BlockDetector;
  readonly deadline: Deadline;
  readonly observer: ScrapeObserver;
}

/**
 * Dialect-specific knowledge of one family of assessment portals. The
 * state machine is shared; strategies only supply data and small hooks.
 */
export interface NavigationStrategy {
  readonly kind: DetailNavigationStrategyKind;
  /** Ordered candidates for the lot number input; first visible wins. */
  readonly lotInputSelectors: readonly string[];
  readonly submitSelectors: readonly string[];
  /** Result entries, most specific first. */
  readonly resultEntrySelectors: readonly string[];
  readonly noResultsPhrases: readonly string[];
  readonly fields: FieldSpecTable;
  /** Steps between loading the search page and locating the lot input. */
  preSearch?(ctx: NavigationContext): Promise<void>;
  /** Steps between typing the lot number and submitting. */
  beforeSubmit?(ctx: NavigationContext): Promise<void>;
  isDetailPage(snapshot: PageSnapshot, lotNumber: string): boolean;
}

export interface NavigationResult extends NavigationOutcome {
  fields: InternalFields;
  /** Fields came from the result listing rather than a detail page. */
  degraded: boolean;
  /** Last failure or block cause; set for BLOCKED and FAILED. */
  cause?: string;
  blockReason?: string;
}
