import type { GenerationJob, GenerationScheduler } from "./orchestrator.js"

/**
 * In-process scheduler: starts each pipeline without awaiting it and keeps
 * the promise so callers (tests, one-shot scripts) can wait for all of them.
 */
export class BackgroundRunner implements GenerationScheduler {
  private readonly inFlight = new Set<Promise<void>>()

  constructor(
    private readonly run: (job: GenerationJob) => Promise<unknown>,
    private readonly onError: (err: unknown, job: GenerationJob) => void,
  ) {}

  async schedule(job: GenerationJob): Promise<void> {
    const task: Promise<void> = this.run(job)
      .then(
        () => undefined,
        (err: unknown) => this.onError(err, job),
      )
      .finally(() => {
        this.inFlight.delete(task)
      })
    this.inFlight.add(task)
  }

  /** Resolves once every scheduled pipeline has settled. */
  async drain(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.all([...this.inFlight])
    }
  }

  get pending(): number {
    return this.inFlight.size
  }
}
