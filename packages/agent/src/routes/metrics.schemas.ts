/**
 * Typebox schemas for metrics API routes.
 */

import { Type, type Static } from "@sinclair/typebox";

// ---------------------------------------------------------------------------
// Query params
// ---------------------------------------------------------------------------

export const MetricsQuery = Type.Object({
  kind: Type.Optional(
    Type.Union([
      Type.Literal("counter"),
      Type.Literal("gauge"),
      Type.Literal("summary"),
      Type.Literal("histogram"),
      Type.Literal("fields"),
    ]),
  ),
});

export type MetricsQuery = Static<typeof MetricsQuery>;
