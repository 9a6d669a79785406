import { ClipHandle } from '../timeline/timeline.model';

export const CUT_MODES = ['J', 'L'] as const;

/** J: audio leads the video cut. L: audio trails it. */
export type CutMode = (typeof CUT_MODES)[number];

export interface CutOptions {
  offsetFrames: number;
  mode: CutMode;
  dryRun?: boolean;
}

/**
 * A video cut at `frame`, where video clip A ends and video clip B starts.
 * The audio handles are set when an audio clip ends (A) or starts (B)
 * exactly at `frame`.
 */
export interface Boundary {
  readonly frame: number;
  readonly videoA: ClipHandle;
  readonly videoB: ClipHandle;
  readonly audioA?: ClipHandle;
  readonly audioB?: ClipHandle;
}

export type IneligibilityReason =
  | 'audio clip missing'
  | 'audio gap'
  | 'boundary not A/V aligned'
  | 'zero-duration clip'
  | 'audio edit already claimed by an earlier boundary';

export type DetectedBoundary =
  | { readonly boundary: Boundary; readonly eligible: true }
  | { readonly boundary: Boundary; readonly eligible: false; readonly reason: IneligibilityReason };

export type BoundaryOutcome = 'applied' | 'skipped-ineligible' | 'skipped-infeasible' | 'failed';

export interface BoundaryResult {
  readonly outcome: BoundaryOutcome;
  readonly reason: string;
  readonly boundary: Boundary;
}
