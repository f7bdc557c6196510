/**
 * Standard stream helpers for hook subcommands
 */

import type { HookResult } from '@hook-gate/common';

export type InputStream = AsyncIterable<unknown> & { isTTY?: boolean };

/**
 * Read all of stdin. A terminal on stdin yields an empty payload.
 */
export async function readStdin(stream: InputStream = process.stdin): Promise<string> {
  if (stream.isTTY) {
    return '';
  }

  const chunks: Buffer[] = [];
  for await (const chunk of stream) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }
  return Buffer.concat(chunks).toString('utf-8');
}

export interface OutputStreams {
  stdout: (text: string) => void;
  stderr: (text: string) => void;
}

const processStreams: OutputStreams = {
  stdout: text => process.stdout.write(text),
  stderr: text => process.stderr.write(text),
};

/**
 * The decision object goes to stdout as one JSON line; report lines go
 * to stderr.
 */
export function writeResult(result: HookResult, streams: OutputStreams = processStreams): void {
  if (result.output) {
    streams.stdout(`${JSON.stringify(result.output)}\n`);
  }
  for (const message of result.messages) {
    streams.stderr(`${message}\n`);
  }
}
