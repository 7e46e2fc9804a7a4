import type { ScrapingSessionStatus } from "./models";

export const ALLOWED_TRANSITIONS: ReadonlyMap<ScrapingSessionStatus, ScrapingSessionStatus[]> = new Map([
  // running -> running covers resuming a run whose process died without flushing
  ["running", ["running", "completed", "interrupted", "failed"]],
  ["interrupted", ["running", "completed", "failed"]],
  ["completed", []],
  ["failed", []],
]);

export const RESUMABLE_STATUSES: readonly ScrapingSessionStatus[] = ["running", "interrupted"];

export function canTransition(from: ScrapingSessionStatus, to: ScrapingSessionStatus): boolean {
  const allowed = ALLOWED_TRANSITIONS.get(from);
  return allowed?.includes(to) ?? false;
}

export function validateTransition(from: ScrapingSessionStatus, to: ScrapingSessionStatus): void {
  if (!canTransition(from, to)) {
    const allowed = ALLOWED_TRANSITIONS.get(from);
    throw new Error(
      `Invalid session state transition: ${from} -> ${to}. Allowed: ${allowed && allowed.length > 0 ? allowed.join(", ") : "none"}`
    );
  }
}

export function isTerminal(status: ScrapingSessionStatus): boolean {
  return (ALLOWED_TRANSITIONS.get(status) ?? []).length === 0;
}
