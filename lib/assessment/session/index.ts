export { PlaywrightSessionManager, createSessionManager, DEFAULT_USER_AGENT } from "./browser";
export { PlaywrightPageDriver } from "./playwright-driver";
export { SUBMIT_CONTROL_SELECTOR } from "./page-driver";
export type { ActivationMode, EntryMatch, EntryQuery, PageDriver } from "./page-driver";
export type { SessionConfig, SessionEgress, SessionHandle, SessionManager, Viewport } from "./types";
