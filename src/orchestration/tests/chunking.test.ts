/**
 * Unit tests for chunking module
 */

import { chunkDocument, iterateChunks, joinPages } from '../src/chunking';
import { ConfigError } from '../src/errors';
import { ChunkingConfig } from '../src/types';
import { createTestDocument } from './test-helpers';

describe('Chunking Module', () => {
  const hardCuts = (maxChunkSize: number, overlap: number): ChunkingConfig => ({
    maxChunkSize,
    overlap,
    boundaryTolerance: 0
  });

  describe('Fixed-size chunking', () => {
    it('should split a 1000 character document into 4 overlapping chunks', () => {
      const document = createTestDocument('policy.pdf', ['x'.repeat(1000)]);

      const chunks = chunkDocument(document, hardCuts(300, 50));

      expect(chunks.map(c => [c.startOffset, c.endOffset])).toEqual([
        [0, 300],
        [250, 550],
        [500, 800],
        [750, 1000]
      ]);
      expect(chunks.map(c => c.id)).toEqual(['policy.pdf#0', 'policy.pdf#1', 'policy.pdf#2', 'policy.pdf#3']);
      expect(chunks[3].text).toHaveLength(250);
    });

    it('should yield exactly one chunk for a document shorter than the chunk size', () => {
      const document = createTestDocument('short.pdf', ['Short text']);

      const chunks = chunkDocument(document, hardCuts(300, 50));

      expect(chunks).toHaveLength(1);
      expect(chunks[0].text).toBe('Short text');
      expect(chunks[0].startOffset).toBe(0);
      expect(chunks[0].endOffset).toBe(10);
    });

    it('should yield no chunks for a document without text', () => {
      const document = createTestDocument('empty.pdf', ['', '   ']);

      expect(chunkDocument(document, hardCuts(300, 50))).toHaveLength(0);
    });

    it('should reconstruct the document with exact overlaps', () => {
      const sentence = 'The employee handbook describes leave, pay and conduct rules. ';
      const document = createTestDocument('handbook.pdf', [sentence.repeat(20), sentence.repeat(15)]);
      const { text } = joinPages(document);

      const configs: ChunkingConfig[] = [
        { maxChunkSize: 100, overlap: 0, boundaryTolerance: 0 },
        { maxChunkSize: 120, overlap: 30, boundaryTolerance: 40 },
        { maxChunkSize: 257, overlap: 64, boundaryTolerance: 100 },
        { maxChunkSize: 50, overlap: 49, boundaryTolerance: 10 }
      ];

      for (const config of configs) {
        const chunks = chunkDocument(document, config);
        let rebuilt = chunks[0].text;

        chunks.forEach((chunk, i) => {
          expect(chunk.text.length).toBeLessThanOrEqual(config.maxChunkSize);
          expect(chunk.text).toBe(text.slice(chunk.startOffset, chunk.endOffset));
          if (i > 0) {
            expect(chunk.startOffset).toBe(chunks[i - 1].endOffset - config.overlap);
            rebuilt += chunk.text.slice(config.overlap);
          }
        });

        expect(chunks[0].startOffset).toBe(0);
        expect(chunks[chunks.length - 1].endOffset).toBe(text.length);
        expect(rebuilt).toBe(text);
      }
    });
  });

  describe('Boundary preference', () => {
    it('should cut after a sentence end inside the tolerance window', () => {
      const document = createTestDocument('doc', ['Alpha beta gamma. Delta epsilon zeta eta theta.']);

      const chunks = chunkDocument(document, { maxChunkSize: 25, overlap: 0, boundaryTolerance: 10 });

      expect(chunks[0].text).toBe('Alpha beta gamma. ');
      expect(chunks[0].endOffset).toBe(18);
      expect(chunks[1].startOffset).toBe(18);
    });

    it('should prefer a paragraph break over a sentence end', () => {
      const document = createTestDocument('doc', ['One. Two\n\nThree four five six seven']);

      const chunks = chunkDocument(document, { maxChunkSize: 14, overlap: 0, boundaryTolerance: 12 });

      expect(chunks[0].text).toBe('One. Two\n\n');
    });

    it('should fall back to a hard cut when no break is near', () => {
      const document = createTestDocument('doc', ['abcdefghijklmnopqrstuvwxyz']);

      const chunks = chunkDocument(document, { maxChunkSize: 10, overlap: 2, boundaryTolerance: 5 });

      expect(chunks[0].text).toBe('abcdefghij');
      expect(chunks[1].startOffset).toBe(8);
    });
  });

  describe('Pages', () => {
    it('should record the pages a chunk spans', () => {
      const document = createTestDocument('doc', ['Page one text.', 'Page two text.']);

      const [chunk] = chunkDocument(document, hardCuts(300, 0));

      expect(chunk.text).toBe('Page one text.\n\nPage two text.');
      expect(chunk.pageNumbers).toEqual([1, 2]);
    });

    it('should skip blank pages but keep page numbers', () => {
      const document = createTestDocument('doc', ['First page', '  ', 'Third page']);

      const [chunk] = chunkDocument(document, hardCuts(300, 0));

      expect(chunk.text).toBe('First page\n\nThird page');
      expect(chunk.pageNumbers).toEqual([1, 3]);
    });

    it('should assign each chunk only the pages it overlaps', () => {
      const document = createTestDocument('doc', ['a'.repeat(10), 'b'.repeat(10)]);

      const chunks = chunkDocument(document, hardCuts(10, 0));

      expect(chunks.map(c => c.pageNumbers)).toEqual([[1], [2], [2]]);
      expect(chunks.map(c => c.text)).toEqual(['a'.repeat(10), '\n\n' + 'b'.repeat(8), 'bb']);
    });
  });

  describe('Lazy iteration', () => {
    it('should produce chunks one at a time', () => {
      const document = createTestDocument('doc', ['x'.repeat(1000)]);
      const iterator = iterateChunks(document, hardCuts(300, 50));

      const first = iterator.next();

      expect(first.done).toBe(false);
      expect(first.value?.endOffset).toBe(300);
    });
  });

  describe('Configuration errors', () => {
    const document = createTestDocument('doc', ['Some text']);

    it('should reject overlap >= chunk size', () => {
      expect(() => chunkDocument(document, hardCuts(100, 100))).toThrow(ConfigError);
    });

    it('should reject a non-positive chunk size', () => {
      expect(() => chunkDocument(document, hardCuts(0, 0))).toThrow(ConfigError);
    });

    it('should name the offending parameter', () => {
      expect(() => chunkDocument(document, hardCuts(100, 150))).toThrow('Invalid overlap');
      expect(() => chunkDocument(document, { maxChunkSize: 100, overlap: 10, boundaryTolerance: -1 }))
        .toThrow('Invalid boundaryTolerance');
    });
  });
});
