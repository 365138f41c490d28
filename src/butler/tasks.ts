/**
 * Fire-and-forget work that must not hold up a reply. A task's failure is
 * logged under its name and goes no further. There is no bound on how many
 * tasks run at once.
 */
export class BackgroundTasks {
  private inFlight: Set<Promise<void>> = new Set()

  get size(): number {
    return this.inFlight.size
  }

  spawn(name: string, task: () => Promise<unknown>): void {
    const running: Promise<void> = Promise.resolve()
      .then(task)
      .then(
        () => undefined,
        (e: unknown) => {
          console.error(`[tasks] ${name} failed:`, e)
        }
      )
      .finally(() => {
        this.inFlight.delete(running)
      })
    this.inFlight.add(running)
  }

  /**
   * Waits for everything in flight, including tasks spawned while waiting.
   * Shutdown only; the reply path never joins.
   */
  async drain(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.all([...this.inFlight])
    }
  }
}
