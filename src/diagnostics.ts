/**
 * Diagnostics
 *
 * Opt-in event emitter for Graph call tracing. Listeners see every request,
 * retry decision, failure and token refresh.
 */

// =============================================================================
// Types
// =============================================================================

export type GovernanceDiagnosticEventType =
  | "graph.request"
  | "graph.retry"
  | "graph.error"
  | "token.refresh";

export type GovernanceDiagnosticEvent = {
  type: GovernanceDiagnosticEventType;
  timestamp: number;
  seq: number;
  method?: string;
  path?: string;
  attempt?: number;
  durationMs?: number;
  statusCode?: number;
  delayMs?: number;
  outcome?: string;
  error?: string;
};

export type GovernanceDiagnosticListener = (event: GovernanceDiagnosticEvent) => void;

// =============================================================================
// Global State
// =============================================================================

let diagnosticsEnabled = false;
let seq = 0;
const listeners = new Set<GovernanceDiagnosticListener>();

// =============================================================================
// Public API
// =============================================================================

export function enableGovernanceDiagnostics(): void {
  diagnosticsEnabled = true;
}

export function disableGovernanceDiagnostics(): void {
  diagnosticsEnabled = false;
}

export function isGovernanceDiagnosticsEnabled(): boolean {
  return diagnosticsEnabled;
}

/** Subscribe to diagnostic events. Returns an unsubscribe function. */
export function onGovernanceDiagnosticEvent(listener: GovernanceDiagnosticListener): () => void {
  listeners.add(listener);
  return () => {
    listeners.delete(listener);
  };
}

export function emitGovernanceDiagnosticEvent(event: Omit<GovernanceDiagnosticEvent, "timestamp" | "seq">): void {
  if (!diagnosticsEnabled) return;

  const fullEvent: GovernanceDiagnosticEvent = {
    ...event,
    timestamp: Date.now(),
    seq: ++seq,
  };

  for (const listener of listeners) {
    try {
      listener(fullEvent);
    } catch (err) {
      // Listener failures stay out of the request path.
      console.error(`[governance] diagnostic listener failed: ${String(err)}`);
    }
  }
}

/**
 * Reset diagnostics state for tests.
 */
export function resetGovernanceDiagnosticsForTest(): void {
  diagnosticsEnabled = false;
  seq = 0;
  listeners.clear();
}
