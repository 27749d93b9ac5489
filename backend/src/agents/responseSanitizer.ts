/** What the collaborator asked for, parsed once right after the call. */
export type ControlMarker = 'ADVANCE' | 'STAY' | 'NONE';

export type Emotion = 'HAPPY' | 'SURPRISED' | 'THINKING' | 'SAD';

/**
 * Emotion keywords in priority order. The first keyword in this list that
 * appears as a whole word wins, however many others occur; HAPPY is the default.
 */
export const EMOTION_PRIORITY: readonly Exclude<Emotion, 'HAPPY'>[] = ['SURPRISED', 'THINKING', 'SAD'];

const MARKER_PATTERN = /\[(STAY|ADVANCE)\]/g;
const LABEL_PREFIX = /^(?:\[(?:HAPPY|SURPRISED|THINKING|SAD)\]|(?:HAPPY|SURPRISED|THINKING|SAD|STORY BUDDY|ASSISTANT)\s*:)\s*/i;

/** The last marker in the text wins when both occur. */
export function parseControlMarker(raw: string): ControlMarker {
  let marker: ControlMarker = 'NONE';
  for (const match of raw.matchAll(MARKER_PATTERN)) {
    marker = match[1] === 'ADVANCE' ? 'ADVANCE' : 'STAY';
  }
  return marker;
}

/**
 * Remove every control marker (wherever it occurs), tidy whitespace, then strip
 * leading emotion or speaker labels. sanitizeReply(sanitizeReply(x)) equals
 * sanitizeReply(x).
 */
export function sanitizeReply(raw: string): string {
  let text = raw;
  let previous: string;
  do {
    previous = text;
    text = text.replace(MARKER_PATTERN, '');
  } while (text !== previous);

  text = text.replace(/[ \t]{2,}/g, ' ').replace(/[ \t]+\n/g, '\n').trim();

  while (LABEL_PREFIX.test(text)) {
    text = text.replace(LABEL_PREFIX, '').trim();
  }
  return text;
}

export function extractEmotion(raw: string): Emotion {
  const upper = raw.toUpperCase();
  for (const emotion of EMOTION_PRIORITY) {
    if (new RegExp(`\\b${emotion}\\b`).test(upper)) return emotion;
  }
  return 'HAPPY';
}
