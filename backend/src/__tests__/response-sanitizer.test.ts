import { describe, it, expect } from 'vitest';
import { extractEmotion, parseControlMarker, sanitizeReply } from '../agents/responseSanitizer.js';

describe('parseControlMarker', () => {
  it('reads a trailing marker', () => {
    expect(parseControlMarker('Sam sounds brave! [STAY]')).toBe('STAY');
    expect(parseControlMarker('On to the forest! [ADVANCE]')).toBe('ADVANCE');
  });

  it('returns NONE without a marker', () => {
    expect(parseControlMarker('What happens next?')).toBe('NONE');
    expect(parseControlMarker('[stay] lowercase is not a marker')).toBe('NONE');
  });

  it('lets the last marker win when both occur', () => {
    expect(parseControlMarker('[ADVANCE] wait, no. [STAY]')).toBe('STAY');
    expect(parseControlMarker('[STAY] actually yes [ADVANCE]')).toBe('ADVANCE');
  });
});

describe('sanitizeReply', () => {
  it('strips markers wherever they occur', () => {
    expect(sanitizeReply('Sam sounds brave! [STAY]')).toBe('Sam sounds brave!');
    expect(sanitizeReply('[ADVANCE] Let us go [STAY] on!')).toBe('Let us go on!');
  });

  it('removes markers revealed by an earlier removal', () => {
    expect(sanitizeReply('Yes [[STAY]STAY]')).toBe('Yes');
  });

  it('strips emotion and speaker prefixes', () => {
    expect(sanitizeReply('HAPPY: What a fun idea!')).toBe('What a fun idea!');
    expect(sanitizeReply('[SURPRISED] Wow!')).toBe('Wow!');
    expect(sanitizeReply('Story Buddy: Thinking: Hmm, a dragon?')).toBe('Hmm, a dragon?');
    expect(sanitizeReply('assistant:   Hello there')).toBe('Hello there');
  });

  it('keeps emotion words inside the sentence', () => {
    expect(sanitizeReply('I am so happy: you named him Sam!')).toBe('I am so happy: you named him Sam!');
  });

  it('tidies spaces left behind by removed markers', () => {
    expect(sanitizeReply('Great  idea [STAY] \nWhat next?')).toBe('Great idea\nWhat next?');
  });

  it('is idempotent', () => {
    const samples = [
      'HAPPY: [STAY] Sam sounds brave! [STAY]',
      '[ADVANCE][STAY]',
      'Story Buddy: SAD: Oh no, the colors are gone. [ADVANCE]',
      '   plain text   ',
      'Yes [[STAY]STAY]'
    ];
    for (const sample of samples) {
      const once = sanitizeReply(sample);
      expect(sanitizeReply(once)).toBe(once);
      expect(once).not.toMatch(/\[(STAY|ADVANCE)\]/);
    }
  });
});

describe('extractEmotion', () => {
  it('defaults to HAPPY', () => {
    expect(extractEmotion('What a lovely chameleon!')).toBe('HAPPY');
  });

  it('matches whole words only', () => {
    expect(extractEmotion('Saddle up, explorer!')).toBe('HAPPY');
    expect(extractEmotion('I am SAD the forest is gray')).toBe('SAD');
  });

  it('matches case-insensitively', () => {
    expect(extractEmotion('I was surprised by that!')).toBe('SURPRISED');
  });

  it('prefers keywords by priority, not by position', () => {
    expect(extractEmotion('sad at first, then thinking, then surprised')).toBe('SURPRISED');
    expect(extractEmotion('sad but thinking')).toBe('THINKING');
  });
});
