import { StreamReadError } from '../types/error.js';

/**
 * Splits a byte or text stream into lines without their terminators.
 *
 * A line longer than `maxLineBytes` (UTF-8) fails the read with a
 * StreamReadError, as does any error raised by the underlying stream. A
 * trailing line without a newline is still yielded.
 */
export async function* readLines(
  source: AsyncIterable<Uint8Array | string>,
  maxLineBytes: number,
): AsyncIterable<string> {
  const decoder = new TextDecoder();
  let buffer = '';

  try {
    for await (const chunk of source) {
      buffer += typeof chunk === 'string' ? chunk : decoder.decode(chunk, { stream: true });

      let newlineIndex = buffer.indexOf('\n');
      while (newlineIndex !== -1) {
        const line = stripCarriageReturn(buffer.slice(0, newlineIndex));
        buffer = buffer.slice(newlineIndex + 1);
        assertLineSize(line, maxLineBytes);
        yield line;
        newlineIndex = buffer.indexOf('\n');
      }

      assertLineSize(buffer, maxLineBytes);
    }

    buffer += decoder.decode();
  } catch (err) {
    if (err instanceof StreamReadError) {
      throw err;
    }
    throw new StreamReadError(
      `read stdout: ${err instanceof Error ? err.message : String(err)}`,
      err instanceof Error ? err : undefined,
    );
  }

  if (buffer.length > 0) {
    const line = stripCarriageReturn(buffer);
    assertLineSize(line, maxLineBytes);
    yield line;
  }
}

function stripCarriageReturn(line: string): string {
  return line.endsWith('\r') ? line.slice(0, -1) : line;
}

function assertLineSize(line: string, maxLineBytes: number): void {
  // A UTF-16 unit never encodes to more than 3 UTF-8 bytes.
  if (line.length * 3 <= maxLineBytes) {
    return;
  }
  const size = Buffer.byteLength(line, 'utf8');
  if (size > maxLineBytes) {
    throw new StreamReadError(`read stdout: line of ${size} bytes exceeds limit of ${maxLineBytes} bytes`);
  }
}
