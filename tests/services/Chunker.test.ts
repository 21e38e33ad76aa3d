import { describe, it, expect } from 'vitest';
import { Chunker } from '../../src/services/Chunker.js';
import { ValidationError } from '../../src/errors.js';

function sentences(count: number): string {
  return Array.from(
    { length: count },
    (_, i) => `Sentence ${i} describes how accounts are reviewed each quarter.`
  ).join(' ');
}

describe('Chunker', () => {
  describe('constructor', () => {
    it('should use 1000/200 character defaults', () => {
      const chunker = new Chunker();
      expect(chunker.window).toBe(1000);
      expect(chunker.overlap).toBe(200);
      expect(chunker.slack).toBe(100);
    });

    it('should convert token sizes to characters', () => {
      const chunker = new Chunker({ unit: 'tokens', window: 10, overlap: 2 });
      expect(chunker.window).toBe(40);
      expect(chunker.overlap).toBe(8);
      expect(chunker.slack).toBe(4);
    });

    it('should reject an overlap that is not below the window', () => {
      expect(() => new Chunker({ window: 100, overlap: 100 })).toThrow(ValidationError);
    });

    it('should reject a non-positive window', () => {
      expect(() => new Chunker({ window: 0, overlap: 0 })).toThrow(ValidationError);
    });

    it('should reject a slack that leaves no room to advance', () => {
      expect(() => new Chunker({ window: 100, overlap: 20, slack: 80 })).toThrow(
        'Chunk slack must be below window minus overlap'
      );
    });
  });

  describe('chunk', () => {
    it('should return no spans for empty text', () => {
      expect(new Chunker().chunk('')).toEqual([]);
    });

    it('should return a single span for text shorter than the window', () => {
      const text = 'a'.repeat(500);
      const spans = new Chunker().chunk(text);

      expect(spans).toHaveLength(1);
      expect(spans[0]).toMatchObject({ index: 0, start: 0, end: 500 });
    });

    it('should split unbroken text at the window with the configured overlap', () => {
      const spans = new Chunker({ window: 1000, overlap: 200 }).chunk('a'.repeat(2500));

      expect(spans.map((s) => [s.start, s.end])).toEqual([
        [0, 1000],
        [800, 1800],
        [1600, 2500],
        [2300, 2500],
      ]);
      expect(spans.map((s) => s.index)).toEqual([0, 1, 2, 3]);
    });

    it('should cover the whole text with overlapping, in-order spans', () => {
      const text = sentences(60);
      const spans = new Chunker({ window: 300, overlap: 60 }).chunk(text);

      expect(spans[0].start).toBe(0);
      expect(spans[spans.length - 1].end).toBe(text.length);
      for (let i = 0; i < spans.length; i++) {
        expect(spans[i].text).toBe(text.slice(spans[i].start, spans[i].end));
        if (i > 0) {
          expect(spans[i].start).toBeGreaterThan(spans[i - 1].start);
          expect(spans[i].start).toBeLessThan(spans[i - 1].end);
        }
      }
    });

    it('should start each span exactly one overlap before the previous end', () => {
      const paragraphs = Array.from(
        { length: 12 },
        (_, i) =>
          `Paragraph ${i} maps to AC-${i + 1} and AU-6(1). ` +
          'Access reviews happen quarterly! Are logs retained? Yes. '.repeat((i % 3) + 1)
      ).join('\n\n');
      const cases: Array<[Chunker, string]> = [
        [new Chunker({ window: 300, overlap: 60 }), sentences(60)],
        [new Chunker({ window: 200, overlap: 40 }), paragraphs],
        [new Chunker({ window: 120, overlap: 0 }), paragraphs],
        [new Chunker({ unit: 'tokens', window: 40, overlap: 8 }), paragraphs],
        [new Chunker({ window: 100, overlap: 20 }), 'x'.repeat(96) + ' AC.L2-3.1.1 ' + 'y'.repeat(400)],
      ];

      for (const [chunker, text] of cases) {
        const spans = chunker.chunk(text);
        expect(spans.length).toBeGreaterThan(1);

        let rebuilt = spans[0].text;
        for (let i = 1; i < spans.length; i++) {
          expect(spans[i].start).toBe(spans[i - 1].end - chunker.overlap);
          rebuilt += spans[i].text.slice(chunker.overlap);
        }
        expect(rebuilt).toBe(text);
      }
    });

    it('should give the same spans for the same text', () => {
      const chunker = new Chunker({ window: 250, overlap: 50 });
      const text = sentences(30);
      expect(chunker.chunk(text)).toEqual(chunker.chunk(text));
    });

    it('should prefer a paragraph break near the window end', () => {
      const text = 'a'.repeat(93) + '\n\n' + 'b'.repeat(200);
      const [first] = new Chunker({ window: 100, overlap: 20 }).chunk(text);

      expect(first.end).toBe(95);
      expect(first.text).toBe('a'.repeat(93) + '\n\n');
    });

    it('should fall back to a sentence break when there is no paragraph break', () => {
      const text = 'a'.repeat(91) + '. ' + 'b'.repeat(200);
      const [first] = new Chunker({ window: 100, overlap: 20 }).chunk(text);

      expect(first.end).toBe(93);
    });

    it('should take a paragraph break over a later sentence break', () => {
      const text = 'a'.repeat(90) + '\n\n' + 'ccc. ' + 'b'.repeat(200);
      const [first] = new Chunker({ window: 100, overlap: 20 }).chunk(text);

      expect(first.end).toBe(92);
    });

    it('should not cut through a control identifier', () => {
      const text = 'x'.repeat(96) + ' AC-2(1) ' + 'y'.repeat(200);
      const spans = new Chunker({ window: 100, overlap: 20 }).chunk(text);

      expect(spans[0].end).toBe(97);
      expect(spans[0].controlIds).toEqual([]);
      expect(spans[1].start).toBe(77);
      expect(spans[1].controlIds).toEqual(['AC-2(1)']);
    });

    it('should list control identifiers once, in order of first appearance', () => {
      const text = 'See AU-6 and AC.L2-3.1.1, then AU-6 again alongside AC-2.';
      const [span] = new Chunker().chunk(text);

      expect(span.controlIds).toEqual(['AU-6', 'AC.L2-3.1.1', 'AC-2']);
    });

    it('should recognise custom control identifier patterns', () => {
      const chunker = new Chunker({ controlIdPatterns: [/\bCTRL-\d{3}\b/] });
      const [span] = chunker.chunk('Mapped to CTRL-001 and CTRL-002, not AC-2.');

      expect(span.controlIds).toEqual(['CTRL-001', 'CTRL-002']);
    });
  });
});
