/**
 * Typebox schemas for the status API routes.
 */

import { Type, type Static } from "@sinclair/typebox";

// ---------------------------------------------------------------------------
// Query params
// ---------------------------------------------------------------------------

export const TasksQuery = Type.Object({
  /** Only targets whose last run failed */
  failing: Type.Optional(Type.Boolean({ default: false })),
  task: Type.Optional(Type.String({ minLength: 1 })),
});

export type TasksQuery = Static<typeof TasksQuery>;
