/**
 * Line-oriented output sink for child process streams
 */

import type { Readable } from 'stream';
import { createInterface } from 'readline';
import { maskSecrets, type Logger } from '../utils/logger.js';

export type OutputStream = 'stdout' | 'stderr';

/**
 * Receives one line of process output at a time, without the trailing newline
 */
export type LineSink = (line: string, stream: OutputStream) => void;

/**
 * Sink that writes each line to a logger at debug level
 */
export function createLoggerSink(log: Logger): LineSink {
  return (line, stream) => {
    log.debug({ stream }, line);
  };
}

/**
 * Sink that keeps lines in memory, for tests that assert on output
 */
export function createBufferSink(): LineSink & { lines: Array<{ stream: OutputStream; line: string }> } {
  const lines: Array<{ stream: OutputStream; line: string }> = [];
  const sink = (line: string, stream: OutputStream): void => {
    lines.push({ stream, line });
  };
  return Object.assign(sink, { lines });
}

/**
 * Sink that masks every secret in a line before passing it on
 */
export function maskSink(sink: LineSink, secrets: readonly string[]): LineSink {
  if (secrets.length === 0) {
    return sink;
  }
  return (line, stream) => sink(maskSecrets(line, secrets), stream);
}

/**
 * Forward every line of `input` to `sink`
 */
export function pipeLines(input: Readable | null, stream: OutputStream, sink: LineSink): void {
  if (!input) {
    return;
  }
  const reader = createInterface({ input, crlfDelay: Infinity });
  reader.on('line', (line) => sink(line, stream));
}
