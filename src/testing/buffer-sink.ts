import type { OutputSink } from "../core/interfaces/output-sink";

/**
 * Output sink collecting everything written to it
 */
export class BufferSink implements OutputSink {
  readonly chunks: string[] = [];

  write(chunk: string): boolean {
    this.chunks.push(chunk);
    return true;
  }

  text(): string {
    return this.chunks.join("");
  }

  lines(): string[] {
    return this.text().split("\n").filter((line) => line.length > 0);
  }
}
