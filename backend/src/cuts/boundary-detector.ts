// cutshift/backend/src/cuts/boundary-detector.ts
import {
  Clip,
  Timeline,
  Track,
  clipEnd,
  findTrack,
  trackClips,
} from '../timeline/timeline.model';
import { TimelineStructureError } from './cuts.errors';
import { Boundary, DetectedBoundary, IneligibilityReason } from './cuts.types';

export interface CoreTracks {
  video: Track;
  audio: Track;
}

/**
 * Picks the video and audio track that cut processing works on.
 * A timeline missing either one cannot be processed.
 */
export function selectCoreTracks(timeline: Timeline): CoreTracks {
  const video = findTrack(timeline, 'video');
  const audio = findTrack(timeline, 'audio');

  if (!video) {
    throw new TimelineStructureError(`Timeline "${timeline.name}" has no video track`);
  }
  if (!audio) {
    throw new TimelineStructureError(`Timeline "${timeline.name}" has no audio track`);
  }

  return { video, audio };
}

/**
 * Finds every video cut of the timeline and classifies it.
 *
 * A cut is a pair of video clips touching at frame F. It is eligible when an
 * audio clip ends at F, the next audio clip starts at F and none of the clips
 * at F is empty. Video clips separated by a gap do not form a cut.
 *
 * An audio clip may end one cut and start the next: the two cuts move
 * different edges of it. Eligibility is also tracked per audio edge, but on a
 * track without overlaps or empty clips two cuts never share a frame, so the
 * claimed-edge check only guards against a model that breaks those rules.
 *
 * Detection only classifies; it never fails on a boundary.
 */
export function detectBoundaries(timeline: Timeline): DetectedBoundary[] {
  const { video, audio } = selectCoreTracks(timeline);
  const videoClips = trackClips(timeline, video);
  const audioClips = trackClips(timeline, audio);

  // "<handle>:head" / "<handle>:tail" for audio edges taken by eligible cuts
  const claimedEdges = new Set<string>();
  const detected: DetectedBoundary[] = [];

  for (let i = 0; i < videoClips.length - 1; i++) {
    const videoA = videoClips[i];
    const videoB = videoClips[i + 1];
    const frame = clipEnd(videoA);

    if (frame !== videoB.timelineStart) {
      continue;
    }

    // an empty clip at F both ends and starts there; it is involved either way
    const atFrame = audioClips.filter(
      (clip) => clipEnd(clip) === frame || clip.timelineStart === frame,
    );
    const audioA = pickAudioClip(atFrame.filter((clip) => clipEnd(clip) === frame));
    const audioB = pickAudioClip(atFrame.filter((clip) => clip.timelineStart === frame));

    const boundary: Boundary = {
      frame,
      videoA: videoA.handle,
      videoB: videoB.handle,
      audioA: audioA?.handle,
      audioB: audioB?.handle,
    };

    const reason = classify(frame, [videoA, videoB, ...atFrame], audioA, audioB, audioClips);
    if (reason) {
      detected.push({ boundary, eligible: false, reason });
      continue;
    }

    // classify() only passes when both audio clips exist; the claim check
    // cannot trigger on a well-formed track
    if (audioA && audioB) {
      const tailKey = `${audioA.handle}:tail`;
      const headKey = `${audioB.handle}:head`;
      if (claimedEdges.has(tailKey) || claimedEdges.has(headKey)) {
        detected.push({
          boundary,
          eligible: false,
          reason: 'audio edit already claimed by an earlier boundary',
        });
        continue;
      }
      claimedEdges.add(tailKey);
      claimedEdges.add(headKey);
    }

    detected.push({ boundary, eligible: true });
  }

  return detected;
}

/** Prefers a clip with content over an empty one sitting on the same frame. */
function pickAudioClip(candidates: Clip[]): Clip | undefined {
  return candidates.find((clip) => clip.duration > 0) ?? candidates[0];
}

function classify(
  frame: number,
  involved: Clip[],
  audioA: Clip | undefined,
  audioB: Clip | undefined,
  audioClips: Clip[],
): IneligibilityReason | null {
  if (involved.some((clip) => clip.duration <= 0)) {
    return 'zero-duration clip';
  }

  const spansCut = audioClips.some(
    (clip) => clip.timelineStart < frame && clipEnd(clip) > frame,
  );
  if (spansCut) {
    return 'boundary not A/V aligned';
  }

  if (audioA && audioB) {
    return null;
  }

  const audioBefore = audioA ?? audioClips.find((clip) => clipEnd(clip) < frame);
  const audioAfter = audioB ?? audioClips.find((clip) => clip.timelineStart > frame);

  return audioBefore && audioAfter ? 'audio gap' : 'audio clip missing';
}
