import { CHUNK_SAFETY_MARGIN, chunkReport, reassemble, TELEGRAM_MAX_MESSAGE_LENGTH } from '../../../src/report/chunker.js';
import { renderReport } from '../../../src/report/composer.js';
import type { ReportBody } from '../../../src/types/update.js';

function body(count: number, width: number): ReportBody {
  return { lines: Array.from({ length: count }, (_, i) => String(i).padStart(width, 'x')) };
}

describe('chunkReport', () => {
  it('defaults to the Telegram limit with a 256 character margin', () => {
    expect(TELEGRAM_MAX_MESSAGE_LENGTH).toBe(4096);
    expect(CHUNK_SAFETY_MARGIN).toBe(256);
  });

  it('returns one chunk equal to the whole body when it fits', () => {
    const report = body(10, 50);
    const chunks = chunkReport(report);
    expect(chunks).toEqual([{ text: renderReport(report), ordinal: 1 }]);
  });

  it('does not split a body between the margin and the limit', () => {
    const report = body(4, 1000);
    expect(renderReport(report).length).toBe(4003);
    expect(chunkReport(report)).toHaveLength(1);
  });

  it('splits 200 lines of 30 characters into two chunks under 3840', () => {
    const report = body(200, 30);
    const chunks = chunkReport(report);

    expect(chunks).toHaveLength(2);
    expect(chunks.map((c) => c.ordinal)).toEqual([1, 2]);
    expect(chunks[0]?.text.split('\n')).toHaveLength(123);
    expect(chunks[1]?.text.split('\n')).toHaveLength(77);
    for (const chunk of chunks) expect(chunk.text.length).toBeLessThanOrEqual(3840);
    expect(reassemble(chunks)).toBe(renderReport(report));
  });

  it('packs greedily against a custom limit', () => {
    const chunks = chunkReport({ lines: ['aaaa', 'bbbb', 'cccc', 'dddd', 'eeee'] }, 20, 5);
    expect(chunks).toEqual([
      { text: 'aaaa\nbbbb\ncccc', ordinal: 1 },
      { text: 'dddd\neeee', ordinal: 2 },
    ]);
  });

  it('never places a boundary inside a line', () => {
    const report = body(500, 37);
    const chunks = chunkReport(report);
    const rejoined = chunks.flatMap((c) => c.text.split('\n'));
    expect(rejoined).toEqual(report.lines);
  });

  it('keeps blank lines', () => {
    const report: ReportBody = { lines: ['head', '', ...body(300, 20).lines, ''] };
    expect(reassemble(chunkReport(report))).toBe(renderReport(report));
  });

  it('emits an over-long line as its own oversized chunk', () => {
    const long = 'x'.repeat(5000);
    const chunks = chunkReport({ lines: ['short', long, 'tail'] });
    expect(chunks.map((c) => c.text)).toEqual(['short', long, 'tail']);
    expect(reassemble(chunks)).toBe(`short\n${long}\ntail`);
  });

  it('does not emit an empty chunk before a leading over-long line', () => {
    const long = 'y'.repeat(4500);
    expect(chunkReport({ lines: [long, 'a'] }).map((c) => c.text)).toEqual([long, 'a']);
  });

  it('returns no chunks for an empty body', () => {
    expect(chunkReport({ lines: [] })).toEqual([]);
  });
});
