import { describe, it, expect } from '@jest/globals';
import { demuxLogs, tailBytes } from '@/infra/docker/logs';

function frame(stream: 1 | 2, text: string): Buffer {
  const payload = Buffer.from(text, 'utf8');
  const header = Buffer.alloc(8);
  header.writeUInt8(stream, 0);
  header.writeUInt32BE(payload.length, 4);
  return Buffer.concat([header, payload]);
}

describe('demuxLogs', () => {
  it('splits multiplexed frames by stream and keeps arrival order in combined', () => {
    const buffer = Buffer.concat([frame(1, 'one\n'), frame(2, 'oops\n'), frame(1, 'two\n')]);

    expect(demuxLogs(buffer)).toEqual({
      stdout: 'one\ntwo\n',
      stderr: 'oops\n',
      combined: 'one\noops\ntwo\n',
    });
  });

  it('returns raw text for TTY output', () => {
    expect(demuxLogs(Buffer.from('plain tty output\n'))).toEqual({
      stdout: 'plain tty output\n',
      stderr: '',
      combined: 'plain tty output\n',
    });
  });

  it('ignores a truncated trailing header', () => {
    const buffer = Buffer.concat([frame(1, 'complete\n'), Buffer.from([1, 0, 0])]);

    expect(demuxLogs(buffer).combined).toBe('complete\n');
  });
});

describe('tailBytes', () => {
  it('returns short text unchanged', () => {
    expect(tailBytes('short', 10)).toBe('short');
  });

  it('keeps the last bytes of long text', () => {
    expect(tailBytes('0123456789', 4)).toBe('6789');
  });

  it('moves the cut forward past a split multi-byte character', () => {
    // 'aé' is three bytes, so the last four start inside an 'é'
    expect(tailBytes('aé'.repeat(10), 4)).toBe('aé');
  });
});
