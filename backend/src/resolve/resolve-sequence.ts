// cutshift/backend/src/resolve/resolve-sequence.ts
import { DOMParser, XMLSerializer } from '@xmldom/xmldom';
import { Logger } from '@nestjs/common';
import {
  ClipHandle,
  Timeline,
  TimelineBuilder,
  TrackKind,
  getClip,
} from '../timeline/timeline.model';

/**
 * Reads and writes Resolve timeline files (Sm2SequenceContainer XML).
 *
 * Layout of the parts used here:
 *
 *   <Sm2SequenceContainer>
 *     <VideoTrackVec><Element><Sm2TiTrack><Items>
 *       <Element><Sm2TiVideoClip>
 *         <Name/> <MediaRef/> <Start/> <Duration/> <In/>
 *     ...
 *     <AudioTrackVec> ... <Sm2TiAudioClip> ...
 *
 * Start and Duration are timeline frames, In is the source in-point in frames.
 * Only the first video and first audio track are modelled; everything else in
 * the document is left exactly as it was read.
 */

const logger = new Logger('ResolveSequence');

const ROOT_TAG = 'Sm2SequenceContainer';
const VIDEO_TRACK_ID = 'V1';
const AUDIO_TRACK_ID = 'A1';

/**
 * The XML does not record how long a clip's media is.
 * - unbounded: any forward extension is accepted
 * - observed: media ends at the furthest frame any clip reads from it
 */
export type MediaExtentPolicy = 'unbounded' | 'observed';

export const MEDIA_EXTENT_POLICIES: readonly MediaExtentPolicy[] = ['unbounded', 'observed'];

export interface ParseSequenceOptions {
  entryName: string;
  mediaExtent: MediaExtentPolicy;
}

export interface ResolveSequence {
  readonly entryName: string;
  readonly document: Document;
  readonly timeline: Timeline;
  readonly clipElements: ReadonlyMap<ClipHandle, Element>;
}

export class SequenceParseError extends Error {
  constructor(entryName: string, message: string) {
    super(`${entryName}: ${message}`);
    this.name = 'SequenceParseError';
  }
}

interface RawClip {
  element: Element;
  name: string;
  mediaRef: string;
  start: number;
  duration: number;
  in: number;
}

function isElement(node: Node): node is Element {
  return node.nodeType === 1;
}

function childElements(parent: Element, tagName?: string): Element[] {
  const result: Element[] = [];
  for (let i = 0; i < parent.childNodes.length; i++) {
    const node = parent.childNodes[i];
    if (isElement(node) && (tagName === undefined || node.tagName === tagName)) {
      result.push(node);
    }
  }
  return result;
}

function firstChild(parent: Element, tagName: string): Element | undefined {
  return childElements(parent, tagName)[0];
}

export function getClipProperty(clip: Element, propertyName: string): string | undefined {
  const element = firstChild(clip, propertyName);
  return element ? element.textContent ?? '' : undefined;
}

/**
 * Integer property of a clip element. Missing, empty or non-integer text
 * reads as `defaultValue`.
 */
export function parseIntProperty(clip: Element, propertyName: string, defaultValue = 0): number {
  const value = getClipProperty(clip, propertyName)?.trim();
  if (!value || !/^-?\d+$/.test(value)) {
    return defaultValue;
  }
  return Number.parseInt(value, 10);
}

/**
 * Sets the text of a clip property, appending the property element when the
 * clip does not have one yet (a missing property reads as 0).
 */
function setClipProperty(clip: Element, propertyName: string, value: string): void {
  let element = firstChild(clip, propertyName);
  if (!element) {
    element = clip.ownerDocument.createElement(propertyName);
    clip.appendChild(element);
  }
  element.textContent = value;
}

function parseDocument(xml: string, entryName: string): Document {
  const problems: string[] = [];
  const parser = new DOMParser({
    errorHandler: {
      warning: (message: string) => logger.debug(`${entryName}: ${message}`),
      error: (message: string) => problems.push(message),
      fatalError: (message: string) => problems.push(message),
    },
  });

  let document: Document;
  try {
    document = parser.parseFromString(xml, 'text/xml');
  } catch (error) {
    throw new SequenceParseError(
      entryName,
      `malformed XML (${error instanceof Error ? error.message.trim() : String(error)})`,
    );
  }
  if (problems.length > 0) {
    throw new SequenceParseError(entryName, `malformed XML (${problems[0].trim()})`);
  }
  return document;
}

/**
 * True when the text is well-formed XML with a Sm2SequenceContainer root.
 * Other XML files share the SeqContainer directory and are not timelines.
 */
export function isResolveSequence(xml: string, entryName = 'sequence'): boolean {
  try {
    return parseDocument(xml, entryName).documentElement?.tagName === ROOT_TAG;
  } catch (error) {
    logger.debug(`Skipping ${entryName}: ${error instanceof Error ? error.message : String(error)}`);
    return false;
  }
}

function findTrackItems(root: Element, vectorTag: string): Element | undefined {
  const vector = firstChild(root, vectorTag);
  const element = vector && firstChild(vector, 'Element');
  const track = element && firstChild(element, 'Sm2TiTrack');
  return track && firstChild(track, 'Items');
}

function readClips(items: Element, clipTag: string): RawClip[] {
  return childElements(items, 'Element').flatMap((element) => {
    const clip = firstChild(element, clipTag);
    if (!clip) {
      return [];
    }
    return [
      {
        element: clip,
        name: getClipProperty(clip, 'Name') ?? '',
        mediaRef: getClipProperty(clip, 'MediaRef') ?? '',
        start: parseIntProperty(clip, 'Start'),
        duration: parseIntProperty(clip, 'Duration'),
        in: parseIntProperty(clip, 'In'),
      },
    ];
  });
}

function validateClip(entryName: string, kind: TrackKind, clip: RawClip): void {
  if (clip.duration < 0) {
    throw new SequenceParseError(
      entryName,
      `${kind} clip "${clip.name}" at frame ${clip.start} has negative duration ${clip.duration}`,
    );
  }
  if (clip.in < 0) {
    throw new SequenceParseError(
      entryName,
      `${kind} clip "${clip.name}" at frame ${clip.start} has negative in-point ${clip.in}`,
    );
  }
}

export function parseResolveSequence(xml: string, options: ParseSequenceOptions): ResolveSequence {
  const { entryName } = options;
  const document = parseDocument(xml, entryName);
  const root = document.documentElement;

  if (!root || root.tagName !== ROOT_TAG) {
    throw new SequenceParseError(entryName, `root element is not ${ROOT_TAG}`);
  }

  const tracks: { id: string; kind: TrackKind; clips: RawClip[] }[] = [];

  const videoItems = findTrackItems(root, 'VideoTrackVec');
  if (videoItems) {
    tracks.push({ id: VIDEO_TRACK_ID, kind: 'video', clips: readClips(videoItems, 'Sm2TiVideoClip') });
  }
  const audioItems = findTrackItems(root, 'AudioTrackVec');
  if (audioItems) {
    tracks.push({ id: AUDIO_TRACK_ID, kind: 'audio', clips: readClips(audioItems, 'Sm2TiAudioClip') });
  }

  const mediaExtents = new Map<string, number>();
  for (const track of tracks) {
    for (const clip of track.clips) {
      validateClip(entryName, track.kind, clip);
      const furthest = clip.in + clip.duration;
      mediaExtents.set(clip.mediaRef, Math.max(mediaExtents.get(clip.mediaRef) ?? 0, furthest));
    }
  }

  const builder = new TimelineBuilder(entryName);
  for (const [mediaRef, observed] of mediaExtents) {
    builder.addMedia({
      id: mediaRef,
      name: mediaRef,
      sourceLength: options.mediaExtent === 'observed' ? observed : Number.MAX_SAFE_INTEGER,
    });
  }

  const clipElements = new Map<ClipHandle, Element>();
  for (const track of tracks) {
    builder.addTrack(track.id, track.kind);
    for (const clip of track.clips) {
      const handle = builder.addClip(track.id, {
        mediaId: clip.mediaRef,
        name: clip.name,
        timelineStart: clip.start,
        duration: clip.duration,
        sourceIn: clip.in,
      });
      clipElements.set(handle, clip.element);
    }
  }

  const timeline = builder.build();
  logger.debug(
    `${entryName}: ${tracks.map((track) => `${track.clips.length} ${track.kind} clips`).join(', ') || 'no tracks'}`,
  );

  return { entryName, document, timeline, clipElements };
}

/**
 * Writes the timing of changed audio clips back into the sequence document
 * and serializes it. Only Start, Duration and In are touched.
 */
export function writeResolveSequence(
  sequence: ResolveSequence,
  timeline: Timeline,
): { xml: string; changedClips: number } {
  let changedClips = 0;

  for (const [handle, element] of sequence.clipElements) {
    const before = getClip(sequence.timeline, handle);
    const after = getClip(timeline, handle);
    if (!before || !after || before.trackId !== AUDIO_TRACK_ID) {
      continue;
    }
    if (
      before.timelineStart === after.timelineStart &&
      before.duration === after.duration &&
      before.sourceIn === after.sourceIn
    ) {
      continue;
    }

    setClipProperty(element, 'Start', String(after.timelineStart));
    setClipProperty(element, 'Duration', String(after.duration));
    setClipProperty(element, 'In', String(after.sourceIn));
    changedClips++;
  }

  let xml = new XMLSerializer().serializeToString(sequence.document);
  if (!xml.startsWith('<?xml')) {
    xml = `<?xml version="1.0" encoding="UTF-8"?>\n${xml}`;
  }

  return { xml, changedClips };
}
