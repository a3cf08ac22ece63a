/**
 * Typebox schemas for the metrics route.
 */

import { Type, type Static } from "@sinclair/typebox";

// ---------------------------------------------------------------------------
// Query params
// ---------------------------------------------------------------------------

export const MetricsQuery = Type.Object({
  /** Hostname or IP to probe on demand; empty means the batch export */
  target: Type.Optional(Type.String({ maxLength: 253 })),
});

export type MetricsQuery = Static<typeof MetricsQuery>;
