import { IN_FLIGHT_STATUSES, TERMINAL_STATUSES, type JobStatus } from "@archive/contracts";

const TRANSITIONS: Readonly<Record<JobStatus, readonly JobStatus[]>> = {
  pending: ["fetching", "failed"],
  fetching: ["dedup_checking", "pending", "failed"],
  dedup_checking: ["duplicate", "extracting", "pending", "failed"],
  extracting: ["fusing", "failed"],
  fusing: ["completed", "failed"],
  completed: [],
  duplicate: [],
  failed: [],
};

export function isTerminal(status: JobStatus): boolean {
  return TERMINAL_STATUSES.includes(status);
}

export function isInFlight(status: JobStatus): boolean {
  return IN_FLIGHT_STATUSES.includes(status);
}

export function canTransition(from: JobStatus, to: JobStatus): boolean {
  return TRANSITIONS[from].includes(to);
}

export class InvalidTransitionError extends Error {
  constructor(
    readonly from: JobStatus,
    readonly to: JobStatus
  ) {
    super(`invalid job transition ${from} -> ${to}`);
    this.name = "InvalidTransitionError";
  }
}

export function assertTransition(from: JobStatus, to: JobStatus): void {
  if (!canTransition(from, to)) throw new InvalidTransitionError(from, to);
}
