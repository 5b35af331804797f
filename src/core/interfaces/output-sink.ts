/**
 * Anything text can be written to: process.stdout, a socket, a test buffer.
 */
export interface OutputSink {
  readonly write: (chunk: string) => unknown;
  readonly isTTY?: boolean | undefined;
}
