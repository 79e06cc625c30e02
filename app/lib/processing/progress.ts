import type {
  ExtractionProgress,
  MergePhase,
  MergeProgress,
  ProgressObserver,
} from "../types";

export const PROGRESS_BATCH_SIZE = 10;

/**
 * Publishes immutable progress snapshots. Each update builds a new frozen
 * object from the previous one; observers never see a snapshot change.
 */
export class ProgressReporter<T extends object> {
  private current: Readonly<T>;
  private readonly observer?: ProgressObserver<T>;
  private readonly tag: string;

  constructor(initial: T, observer?: ProgressObserver<T>, tag = "[Progress]") {
    this.current = Object.freeze({ ...initial });
    this.observer = observer;
    this.tag = tag;
  }

  get snapshot(): Readonly<T> {
    return this.current;
  }

  publish(update: Partial<T>): Readonly<T> {
    this.current = Object.freeze({ ...this.current, ...update });
    if (this.observer) {
      try {
        this.observer(this.current);
      } catch (error) {
        // A failing observer must not abort the operation it is watching
        console.warn(`${this.tag} Progress observer threw:`, error);
      }
    }
    return this.current;
  }
}

export class MergeProgressReporter extends ProgressReporter<MergeProgress> {
  private pendingEntries = 0;

  constructor(totalSources: number, observer?: ProgressObserver<MergeProgress>) {
    super(
      {
        totalSources,
        sourcesCompleted: 0,
        currentSource: null,
        totalEntries: 0,
        entriesWritten: 0,
        phase: "validating",
      },
      observer,
      "[Merge]",
    );
  }

  phase(phase: MergePhase, update: Partial<MergeProgress> = {}): void {
    this.flush();
    this.publish({ ...update, phase });
  }

  sourceCompleted(): void {
    this.flush();
    this.publish({ sourcesCompleted: this.snapshot.sourcesCompleted + 1 });
  }

  /** Count one written entry; publishes every PROGRESS_BATCH_SIZE entries. */
  entryWritten(): void {
    this.pendingEntries++;
    if (this.pendingEntries >= PROGRESS_BATCH_SIZE) {
      this.flush();
    }
  }

  flush(): void {
    if (this.pendingEntries === 0) return;
    const entriesWritten = this.snapshot.entriesWritten + this.pendingEntries;
    this.pendingEntries = 0;
    this.publish({ entriesWritten });
  }

  fail(phase: "failed" | "cancelled", error: string): void {
    this.flush();
    this.publish({ phase, error });
  }
}

export function createExtractionReporter(
  source: string,
  observer?: ProgressObserver<ExtractionProgress>,
): ProgressReporter<ExtractionProgress> {
  return new ProgressReporter<ExtractionProgress>(
    {
      source,
      entriesFound: 0,
      entriesExtracted: 0,
      currentFile: null,
      phase: "reading",
    },
    observer,
    "[Extract]",
  );
}
