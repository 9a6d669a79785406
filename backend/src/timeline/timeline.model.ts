// cutshift/backend/src/timeline/timeline.model.ts

/**
 * In-memory timeline model.
 *
 * Clips live in a per-timeline arena: a clip is addressed by its handle, the
 * index of the clip in `Timeline.clips`. Tracks hold handles, never clip
 * objects, so a clip can be replaced without leaving stale references behind.
 * All structures are read-only; edits produce a new timeline.
 */

export type TrackKind = 'video' | 'audio';

export type ClipHandle = number;

export interface MediaSource {
  readonly id: string;
  readonly name: string;
  /** Available frames are `[0, sourceLength)`. */
  readonly sourceLength: number;
}

export interface Clip {
  readonly handle: ClipHandle;
  readonly trackId: string;
  readonly mediaId: string;
  readonly name: string;
  readonly timelineStart: number;
  readonly duration: number;
  readonly sourceIn: number;
  readonly sourceOut: number;
}

export interface Track {
  readonly id: string;
  readonly kind: TrackKind;
  /** Sorted by the clips' timeline start. */
  readonly clips: readonly ClipHandle[];
}

export interface Timeline {
  readonly name: string;
  readonly media: ReadonlyMap<string, MediaSource>;
  readonly clips: readonly Clip[];
  readonly tracks: readonly Track[];
}

export interface ClipInput {
  mediaId: string;
  name?: string;
  timelineStart: number;
  duration: number;
  sourceIn: number;
}

/**
 * Moves one edge of a clip by `delta` frames.
 *
 * `head` moves the in-point (timeline start and source in together, the
 * duration absorbs the change); `tail` moves the out-point.
 */
export interface ClipEdgeEdit {
  readonly handle: ClipHandle;
  readonly edge: 'head' | 'tail';
  readonly delta: number;
}

export function clipEnd(clip: Pick<Clip, 'timelineStart' | 'duration'>): number {
  return clip.timelineStart + clip.duration;
}

export function getClip(timeline: Timeline, handle: ClipHandle): Clip | undefined {
  if (!Number.isInteger(handle) || handle < 0 || handle >= timeline.clips.length) {
    return undefined;
  }
  const clip = timeline.clips[handle];
  return clip.handle === handle ? clip : undefined;
}

/**
 * First track of the given kind. Only the first video and the first audio
 * track take part in cut processing; any further tracks are carried along.
 */
export function findTrack(timeline: Timeline, kind: TrackKind): Track | undefined {
  return timeline.tracks.find((track) => track.kind === kind);
}

/**
 * Resolves a track's handles to clips in timeline order. Handles that do not
 * resolve are left out.
 */
export function trackClips(timeline: Timeline, track: Track): Clip[] {
  const clips: Clip[] = [];
  for (const handle of track.clips) {
    const clip = getClip(timeline, handle);
    if (clip) {
      clips.push(clip);
    }
  }
  return clips.sort((a, b) => a.timelineStart - b.timelineStart);
}

/**
 * Builds a new timeline with the given edge edits applied. Clips that no edit
 * touches are shared with the source timeline.
 */
export function applyClipEdits(timeline: Timeline, edits: readonly ClipEdgeEdit[]): Timeline {
  if (edits.length === 0) {
    return timeline;
  }

  const clips = [...timeline.clips];
  for (const edit of edits) {
    const clip = getClip(timeline, edit.handle);
    if (!clip) {
      throw new Error(`Cannot edit clip ${edit.handle}: no such clip`);
    }
    const current = clips[edit.handle];
    clips[edit.handle] =
      edit.edge === 'head'
        ? {
            ...current,
            timelineStart: current.timelineStart + edit.delta,
            duration: current.duration - edit.delta,
            sourceIn: current.sourceIn + edit.delta,
          }
        : {
            ...current,
            duration: current.duration + edit.delta,
            sourceOut: current.sourceOut + edit.delta,
          };
  }

  return { ...timeline, clips };
}

/**
 * Assembles a timeline clip by clip. Used by the sequence parser and by tests.
 */
export class TimelineBuilder {
  private readonly media = new Map<string, MediaSource>();
  private readonly clips: Clip[] = [];
  private readonly tracks: { id: string; kind: TrackKind; clips: ClipHandle[] }[] = [];

  constructor(private readonly name: string) {}

  addMedia(media: MediaSource): this {
    this.media.set(media.id, media);
    return this;
  }

  hasMedia(id: string): boolean {
    return this.media.has(id);
  }

  addTrack(id: string, kind: TrackKind): this {
    if (this.tracks.some((track) => track.id === id)) {
      throw new Error(`Duplicate track id: ${id}`);
    }
    this.tracks.push({ id, kind, clips: [] });
    return this;
  }

  addClip(trackId: string, input: ClipInput): ClipHandle {
    const track = this.tracks.find((candidate) => candidate.id === trackId);
    if (!track) {
      throw new Error(`Unknown track: ${trackId}`);
    }

    const handle = this.clips.length;
    this.clips.push({
      handle,
      trackId,
      mediaId: input.mediaId,
      name: input.name ?? '',
      timelineStart: input.timelineStart,
      duration: input.duration,
      sourceIn: input.sourceIn,
      sourceOut: input.sourceIn + input.duration,
    });
    track.clips.push(handle);
    return handle;
  }

  build(): Timeline {
    const clips = [...this.clips];
    return {
      name: this.name,
      media: new Map(this.media),
      clips,
      tracks: this.tracks.map((track) => ({
        id: track.id,
        kind: track.kind,
        clips: [...track.clips].sort(
          (a, b) => clips[a].timelineStart - clips[b].timelineStart || a - b,
        ),
      })),
    };
  }
}
