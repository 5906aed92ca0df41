/**
 * Azure Usage — Diagnostics
 *
 * Event emitter for page-level tracing of usage fetches.
 */

// =============================================================================
// Types
// =============================================================================

export type UsageDiagnosticEventType =
  | "usage.page.fetched"
  | "usage.page.retry"
  | "usage.fetch.completed"
  | "usage.fetch.failed";

export type UsageDiagnosticEvent = {
  type: UsageDiagnosticEventType;
  timestamp: number;
  seq: number;
  subscriptionId: string;
  pageIndex: number;
  recordsYielded: number;
  durationMs?: number;
  statusCode?: number;
  delayMs?: number;
  attempt?: number;
  error?: string;
};

export type UsageDiagnosticListener = (event: UsageDiagnosticEvent) => void;

// =============================================================================
// Global State
// =============================================================================

let diagnosticsEnabled = false;
let seq = 0;
const listeners = new Set<UsageDiagnosticListener>();

// =============================================================================
// Public API
// =============================================================================

/** Enable usage diagnostics tracing. */
export function enableUsageDiagnostics(): void {
  diagnosticsEnabled = true;
}

/** Disable usage diagnostics tracing. */
export function disableUsageDiagnostics(): void {
  diagnosticsEnabled = false;
}

export function isUsageDiagnosticsEnabled(): boolean {
  return diagnosticsEnabled;
}

/** Subscribe to diagnostic events. Returns an unsubscribe function. */
export function onUsageDiagnosticEvent(listener: UsageDiagnosticListener): () => void {
  listeners.add(listener);
  return () => {
    listeners.delete(listener);
  };
}

/** Emit a diagnostic event to all subscribers. */
export function emitUsageDiagnosticEvent(event: Omit<UsageDiagnosticEvent, "timestamp" | "seq">): void {
  if (!diagnosticsEnabled) return;

  const fullEvent: UsageDiagnosticEvent = {
    ...event,
    timestamp: Date.now(),
    seq: ++seq,
  };

  for (const listener of listeners) {
    try {
      listener(fullEvent);
    } catch (error) {
      // A faulty listener must not abort the fetch it observes
      process.emitWarning(
        `usage diagnostic listener failed: ${error instanceof Error ? error.message : String(error)}`,
      );
    }
  }
}

/**
 * Reset diagnostics state for tests.
 */
export function resetUsageDiagnosticsForTest(): void {
  diagnosticsEnabled = false;
  seq = 0;
  listeners.clear();
}
