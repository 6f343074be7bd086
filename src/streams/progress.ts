import type { ExtractProgressEvent, ProgressOptions } from '../types.js';

const DEFAULT_PROGRESS_INTERVAL_MS = 50;
const DEFAULT_PROGRESS_CHUNK_INTERVAL = 16;

export interface ProgressTracker {
  update(memberName: string, bytesOut: number): void;
  flush(): void;
}

/** Tracker for one batch, or `null` when nobody listens. */
export function createProgressTracker(options: ProgressOptions | undefined, membersTotal: number): ProgressTracker | null {
  if (!options?.onProgress) return null;
  const intervalMs = Number.isFinite(options.progressIntervalMs ?? DEFAULT_PROGRESS_INTERVAL_MS)
    ? Math.max(0, Math.floor(options.progressIntervalMs ?? DEFAULT_PROGRESS_INTERVAL_MS))
    : DEFAULT_PROGRESS_INTERVAL_MS;
  const chunkInterval = Number.isFinite(options.progressChunkInterval ?? DEFAULT_PROGRESS_CHUNK_INTERVAL)
    ? Math.max(1, Math.floor(options.progressChunkInterval ?? DEFAULT_PROGRESS_CHUNK_INTERVAL))
    : DEFAULT_PROGRESS_CHUNK_INTERVAL;
  return new ThrottledProgressTracker(options.onProgress, membersTotal, intervalMs, chunkInterval);
}

class ThrottledProgressTracker implements ProgressTracker {
  private membersDone = 0;
  private bytesOut = 0n;
  private lastMember: string | undefined;
  private updatesSinceEmit = 0;
  private lastEmit = Date.now();

  constructor(
    private readonly onProgress: (event: ExtractProgressEvent) => void,
    private readonly membersTotal: number,
    private readonly intervalMs: number,
    private readonly chunkInterval: number
  ) {}

  update(memberName: string, bytesOut: number): void {
    this.membersDone += 1;
    this.bytesOut += BigInt(bytesOut);
    this.lastMember = memberName;
    this.updatesSinceEmit += 1;
    const now = Date.now();
    if (this.updatesSinceEmit >= this.chunkInterval || now - this.lastEmit >= this.intervalMs) {
      this.emit(now);
    }
  }

  flush(): void {
    this.emit(Date.now());
  }

  private emit(now: number): void {
    this.lastEmit = now;
    this.updatesSinceEmit = 0;
    this.onProgress({
      kind: 'extract',
      ...(this.lastMember !== undefined ? { memberName: this.lastMember } : {}),
      membersDone: this.membersDone,
      membersTotal: this.membersTotal,
      bytesOut: this.bytesOut
    });
  }
}
