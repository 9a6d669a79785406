/**
 * Raised when a timeline cannot be processed at all, before any boundary is
 * looked at (no video track, no audio track).
 */
export class TimelineStructureError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'TimelineStructureError';
  }
}

/** Raised for run parameters outside their domain (offset, mode). */
export class InvalidCutOptionsError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidCutOptionsError';
  }
}
