import type {
  InvocationEvent,
  InvocationRecord,
  InvocationStatus,
} from "../schemas/invocation-record.js";

export interface FoldedState {
  status: InvocationStatus;
  retry_count: number;
}

/**
 * Derive status and retry_count by folding events.
 *
 * Fold rules:
 *   STARTED   → RUNNING
 *   RETRY     → retry_count++ (status stays RUNNING)
 *   OK        → OK
 *   FAILED    → FAILED
 *   CANCELLED → CANCELLED
 *
 * Empty events → PENDING, 0
 */
export function foldInvocationEvents(events: readonly InvocationEvent[]): FoldedState {
  let status: InvocationStatus = "PENDING";
  let retry_count = 0;

  for (const event of events) {
    switch (event.type) {
      case "STARTED":
        status = "RUNNING";
        break;
      case "RETRY":
        retry_count++;
        break;
      case "OK":
        status = "OK";
        break;
      case "FAILED":
        status = "FAILED";
        break;
      case "CANCELLED":
        status = "CANCELLED";
        break;
    }
  }

  return { status, retry_count };
}

/**
 * Append an event and re-derive status/retry_count from the full event list.
 * Returns a new record.
 */
export function appendEvent(
  record: InvocationRecord,
  event: InvocationEvent,
): InvocationRecord {
  const events = [...record.events, event];
  return { ...record, events, ...foldInvocationEvents(events) };
}
