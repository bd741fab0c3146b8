/**
 * Container log decoding
 *
 * Containers without a TTY return logs in the engine's multiplexed format: frames of an
 * 8-byte header (stream type, 3 padding bytes, big-endian payload length) followed by
 * the payload. TTY containers return raw text. Container logs and exec output are both
 * decoded here.
 */

const HEADER_SIZE = 8;

export interface DemuxedLogs {
  stdout: string;
  stderr: string;
  /** Both streams interleaved in arrival order */
  combined: string;
}

function isMultiplexed(buffer: Buffer): boolean {
  if (buffer.length < HEADER_SIZE) return false;
  const streamType = buffer.readUInt8(0);
  return (
    streamType <= 2 && buffer.readUInt8(1) === 0 && buffer.readUInt8(2) === 0 && buffer.readUInt8(3) === 0
  );
}

export function demuxLogs(buffer: Buffer): DemuxedLogs {
  if (!isMultiplexed(buffer)) {
    const text = buffer.toString('utf8');
    return { stdout: text, stderr: '', combined: text };
  }

  const stdout: Buffer[] = [];
  const stderr: Buffer[] = [];
  const combined: Buffer[] = [];

  let offset = 0;
  while (offset + HEADER_SIZE <= buffer.length) {
    const streamType = buffer.readUInt8(offset);
    const length = buffer.readUInt32BE(offset + 4);
    const payload = buffer.subarray(offset + HEADER_SIZE, offset + HEADER_SIZE + length);
    (streamType === 2 ? stderr : stdout).push(payload);
    combined.push(payload);
    offset += HEADER_SIZE + length;
  }

  return {
    stdout: Buffer.concat(stdout).toString('utf8'),
    stderr: Buffer.concat(stderr).toString('utf8'),
    combined: Buffer.concat(combined).toString('utf8'),
  };
}

const isContinuationByte = (byte: number): boolean => (byte & 0xc0) === 0x80;

/**
 * Keep at most the last `maxBytes` bytes of a log string. The cut never lands inside a
 * multi-byte character.
 */
export function tailBytes(text: string, maxBytes: number): string {
  const bytes = Buffer.from(text, 'utf8');
  if (bytes.length <= maxBytes) return text;

  let start = bytes.length - maxBytes;
  while (start < bytes.length && isContinuationByte(bytes.readUInt8(start))) {
    start++;
  }
  return bytes.subarray(start).toString('utf8');
}
