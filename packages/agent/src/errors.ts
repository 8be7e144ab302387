/**
 * Error taxonomy for the agent.
 *
 *  - SetupFailure: the agent cannot start at all (fatal, exit 1)
 *  - TaskFetchFailure / FormatFailure: one task target failed (isolated)
 *  - DeliveryFailure: a sink could not deliver (fatal for the console sink)
 */

export type AgentErrorCode =
  | "SETUP_FAILURE"
  | "TASK_FETCH_FAILURE"
  | "FORMAT_FAILURE"
  | "DELIVERY_FAILURE";

export abstract class AgentError extends Error {
  abstract readonly code: AgentErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class SetupFailure extends AgentError {
  readonly code = "SETUP_FAILURE";
}

export class TaskFetchFailure extends AgentError {
  readonly code = "TASK_FETCH_FAILURE";
}

export class FormatFailure extends AgentError {
  readonly code = "FORMAT_FAILURE";
}

export class DeliveryFailure extends AgentError {
  readonly code = "DELIVERY_FAILURE";
}

/** Failures a single task target may report without affecting others */
export type TaskFailure = TaskFetchFailure | FormatFailure;

/** Render any thrown value as a short message for logs and status output */
export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
