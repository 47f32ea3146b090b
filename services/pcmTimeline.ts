/**
 * Keeps every captured sample of a recording and tracks which of them
 * still belong to the block that has not been uploaded yet.
 */
export class PcmTimeline {
  private chunks: Float32Array[] = [];
  private totalSamples = 0;
  private blockStart = 0;

  constructor(readonly sampleRate: number) {}

  push(samples: Float32Array): void {
    if (samples.length === 0) return;
    this.chunks.push(samples);
    this.totalSamples += samples.length;
  }

  get length(): number {
    return this.totalSamples;
  }

  get durationSeconds(): number {
    return this.totalSamples / this.sampleRate;
  }

  get pendingSamples(): number {
    return this.totalSamples - this.blockStart;
  }

  /** Samples recorded since the previous block; moves the block boundary to the end. */
  takeBlock(): Float32Array {
    const block = this.slice(this.blockStart, this.totalSamples);
    this.blockStart = this.totalSamples;
    return block;
  }

  lastSeconds(seconds: number): Float32Array {
    const count = Math.min(this.totalSamples, Math.round(seconds * this.sampleRate));
    return this.slice(this.totalSamples - count, this.totalSamples);
  }

  all(): Float32Array {
    return this.slice(0, this.totalSamples);
  }

  reset(): void {
    this.chunks = [];
    this.totalSamples = 0;
    this.blockStart = 0;
  }

  private slice(start: number, end: number): Float32Array {
    const output = new Float32Array(Math.max(0, end - start));
    let chunkStart = 0;
    let written = 0;

    for (const chunk of this.chunks) {
      const chunkEnd = chunkStart + chunk.length;
      if (chunkEnd > start && chunkStart < end) {
        const from = Math.max(start, chunkStart) - chunkStart;
        const to = Math.min(end, chunkEnd) - chunkStart;
        output.set(chunk.subarray(from, to), written);
        written += to - from;
      }
      chunkStart = chunkEnd;
      if (chunkStart >= end) break;
    }

    return output;
  }
}
