// cutshift/backend/src/cuts/cut-transformer.ts
import {
  Clip,
  ClipEdgeEdit,
  ClipHandle,
  Timeline,
  Track,
  applyClipEdits,
  clipEnd,
  getClip,
} from '../timeline/timeline.model';
import { selectCoreTracks } from './boundary-detector';
import { InvalidCutOptionsError } from './cuts.errors';
import { Boundary, BoundaryResult, CUT_MODES, CutOptions, DetectedBoundary } from './cuts.types';

export interface CutRun {
  /** The input timeline on a dry run, otherwise a new timeline. */
  timeline: Timeline;
  results: BoundaryResult[];
}

type BoundaryDecision =
  | { kind: 'apply'; edits: [ClipEdgeEdit, ClipEdgeEdit]; reason: string }
  | { kind: 'infeasible'; reason: string }
  | { kind: 'failed'; reason: string };

export function assertCutOptions(options: CutOptions): void {
  if (!Number.isInteger(options.offsetFrames) || options.offsetFrames <= 0) {
    throw new InvalidCutOptionsError(
      `Offset must be a positive integer frame count, got ${options.offsetFrames}`,
    );
  }
  if (!CUT_MODES.includes(options.mode)) {
    throw new InvalidCutOptionsError(`Cut mode must be 'J' or 'L', got '${String(options.mode)}'`);
  }
}

/**
 * Moves the audio edit point of every eligible boundary by the run's offset.
 *
 * J-cut: the edit moves to F - offset; audio clip A loses its last frames and
 * audio clip B starts earlier. L-cut: the edit moves to F + offset; A runs on
 * and B starts later. Video clips are never touched.
 *
 * Every boundary is decided against the input timeline, and the edits of the
 * accepted boundaries are applied together at the end. Eligible boundaries
 * never share an audio clip edge, so the accepted edits are independent of
 * each other and of processing order.
 */
export function applyCuts(
  timeline: Timeline,
  boundaries: readonly DetectedBoundary[],
  options: CutOptions,
): CutRun {
  assertCutOptions(options);
  const { audio } = selectCoreTracks(timeline);

  const ordered = [...boundaries].sort((a, b) => a.boundary.frame - b.boundary.frame);
  const edits: ClipEdgeEdit[] = [];
  const results: BoundaryResult[] = [];

  for (const detected of ordered) {
    if (!detected.eligible) {
      results.push({
        outcome: 'skipped-ineligible',
        reason: detected.reason,
        boundary: detected.boundary,
      });
      continue;
    }

    const decision = decideBoundary(timeline, audio, detected.boundary, options);
    switch (decision.kind) {
      case 'apply':
        edits.push(...decision.edits);
        results.push({ outcome: 'applied', reason: decision.reason, boundary: detected.boundary });
        break;
      case 'infeasible':
        results.push({
          outcome: 'skipped-infeasible',
          reason: decision.reason,
          boundary: detected.boundary,
        });
        break;
      case 'failed':
        results.push({ outcome: 'failed', reason: decision.reason, boundary: detected.boundary });
        break;
    }
  }

  if (options.dryRun) {
    return { timeline, results };
  }

  return { timeline: applyClipEdits(timeline, edits), results };
}

function decideBoundary(
  timeline: Timeline,
  audioTrack: Track,
  boundary: Boundary,
  { offsetFrames, mode }: CutOptions,
): BoundaryDecision {
  if (boundary.audioA === undefined || boundary.audioB === undefined) {
    return { kind: 'failed', reason: 'eligible boundary has no audio clip pair' };
  }

  const resolvedA = resolveAudioClip(timeline, audioTrack, boundary.audioA);
  if (typeof resolvedA === 'string') {
    return { kind: 'failed', reason: resolvedA };
  }
  const resolvedB = resolveAudioClip(timeline, audioTrack, boundary.audioB);
  if (typeof resolvedB === 'string') {
    return { kind: 'failed', reason: resolvedB };
  }

  const { clip: a, sourceLength: lengthA } = resolvedA;
  const { clip: b } = resolvedB;

  if (clipEnd(a) !== boundary.frame || b.timelineStart !== boundary.frame) {
    return {
      kind: 'failed',
      reason: `audio clips ${a.handle} and ${b.handle} do not meet at frame ${boundary.frame}`,
    };
  }

  const unmet =
    mode === 'J'
      ? checkTrim('A', a, offsetFrames) ?? checkBackwardHandle('B', b, offsetFrames)
      : checkForwardHandle('A', a, lengthA, offsetFrames) ?? checkTrim('B', b, offsetFrames);
  if (unmet) {
    return { kind: 'infeasible', reason: unmet };
  }

  const delta = mode === 'J' ? -offsetFrames : offsetFrames;
  return {
    kind: 'apply',
    edits: [
      { handle: a.handle, edge: 'tail', delta },
      { handle: b.handle, edge: 'head', delta },
    ],
    reason: `${mode}-cut: audio edit moved from frame ${boundary.frame} to ${boundary.frame + delta}`,
  };
}

function resolveAudioClip(
  timeline: Timeline,
  audioTrack: Track,
  handle: ClipHandle,
): { clip: Clip; sourceLength: number } | string {
  const clip = getClip(timeline, handle);
  if (!clip) {
    return `clip handle ${handle} resolves to no clip`;
  }
  if (clip.trackId !== audioTrack.id) {
    return `clip ${handle} (${clip.name}) is not on the audio track`;
  }
  const media = timeline.media.get(clip.mediaId);
  if (!media) {
    return `clip ${handle} (${clip.name}) references unknown media "${clip.mediaId}"`;
  }
  if (clip.sourceOut !== clip.sourceIn + clip.duration) {
    return `clip ${handle} (${clip.name}) has an inconsistent source range`;
  }
  return { clip, sourceLength: media.sourceLength };
}

function checkTrim(side: 'A' | 'B', clip: Clip, offset: number): string | null {
  const remaining = clip.duration - offset;
  if (remaining >= 1) {
    return null;
  }
  return (
    `clip ${side} (${clip.name}) is ${frames(clip.duration)} long; trimming ${frames(offset)} ` +
    `would leave ${remaining} (minimum duration is 1 frame)`
  );
}

function checkBackwardHandle(side: 'A' | 'B', clip: Clip, offset: number): string | null {
  const missing = offset - clip.sourceIn;
  if (missing <= 0) {
    return null;
  }
  return `clip ${side} (${clip.name}) needs ${moreFrames(missing)} of source handle before its in-point`;
}

function checkForwardHandle(
  side: 'A' | 'B',
  clip: Clip,
  sourceLength: number,
  offset: number,
): string | null {
  const missing = clip.sourceOut + offset - sourceLength;
  if (missing <= 0) {
    return null;
  }
  return `clip ${side} (${clip.name}) needs ${moreFrames(missing)} of source handle after its out-point`;
}

function frames(count: number): string {
  return count === 1 ? '1 frame' : `${count} frames`;
}

// "1 more frame", "5 more frames"
function moreFrames(count: number): string {
  return count === 1 ? '1 more frame' : `${count} more frames`;
}
