import { describe, expect, it } from 'vitest';
import { SparseIndex, SparseIndexStateSchema } from './sparseIndex.js';
import { tokenize } from './tokenizer.js';

describe('tokenize', () => {
  it('should lowercase, drop stopwords and keep section references intact', () => {
    expect(tokenize('Was kostet nach §12 Gebührenordnung eine Meldebescheinigung?')).toEqual([
      'kostet',
      '§12',
      'gebührenordnung',
      'meldebescheinigung',
    ]);
  });

  it('should fold spaced section and article references into single terms', () => {
    expect(tokenize('§ 12 Abs. 2 und Art. 3')).toEqual(['§12', 'abs', '2', 'art3']);
    expect(tokenize('§§ 4a')).toEqual(['§4a']);
  });

  it('should keep umlauts and drop single letters', () => {
    expect(tokenize('Straße Ä ö')).toEqual(['straße']);
  });
});

describe('SparseIndex', () => {
  const build = () => {
    const index = new SparseIndex();
    index.add('a', '§12 Gebührenordnung');
    index.add('b', 'Die Gebührenordnung regelt Gebühren für Amtshandlungen.');
    index.add('c', 'Öffnungszeiten des Bürgeramts');
    return index;
  };

  it('should rank with BM25 and let the rare exact term dominate', () => {
    const results = build().search('§ 12 Gebührenordnung', 10);

    // avgdl = 8/3; both a-terms see the same length norm 0.8125, b sees 1.375
    const normA = 1 + 1.5 * 0.8125;
    const expectedA = (Math.log(1 + 2.5 / 1.5) * 2.5) / normA + (Math.log(1 + 1.5 / 2.5) * 2.5) / normA;
    const expectedB = (Math.log(1 + 1.5 / 2.5) * 2.5) / (1 + 1.5 * 1.375);

    expect(results.map((r) => r.chunkId)).toEqual(['a', 'b']);
    expect(results[0].score).toBeCloseTo(expectedA, 10);
    expect(results[1].score).toBeCloseTo(expectedB, 10);
  });

  it('should return at most k results and nothing for unknown terms', () => {
    const index = build();
    expect(index.search('Gebührenordnung', 1).map((r) => r.chunkId)).toEqual(['a']);
    expect(index.search('Parkausweis', 5)).toEqual([]);
    expect(index.search('Gebührenordnung', 0)).toEqual([]);
  });

  it('should order equal scores by chunk id', () => {
    const index = new SparseIndex();
    index.add('z', 'Hundesteuer');
    index.add('m', 'Hundesteuer');
    expect(index.search('Hundesteuer', 5).map((r) => r.chunkId)).toEqual(['m', 'z']);
  });

  it('should replace a chunk that is added again', () => {
    const index = build();
    index.add('c', 'Gebührenordnung');
    expect(index.count()).toBe(3);
    expect(index.search('Bürgeramts', 5)).toEqual([]);
  });

  it('should be empty before anything is added and after clearing', () => {
    const index = build();
    expect(new SparseIndex().search('Gebühr', 5)).toEqual([]);
    index.clear();
    expect(index.count()).toBe(0);
    expect(index.termCount()).toBe(0);
  });

  it('should restore identical rankings from its serialised state', () => {
    const index = build();
    const state = SparseIndexStateSchema.parse(JSON.parse(JSON.stringify(index.toJSON())));
    const restored = SparseIndex.fromJSON(state);

    expect(restored.search('§12 Gebührenordnung Bürgeramts', 10)).toEqual(
      index.search('§12 Gebührenordnung Bürgeramts', 10),
    );
    expect(restored.termCount()).toBe(index.termCount());
  });
});
