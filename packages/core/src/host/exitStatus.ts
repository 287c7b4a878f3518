/**
 * Process-scoped exit status: the maximum of every floor raised so far.
 * Create one per process and inject it where checks are reported.
 */
export class ExitStatus {
  private value = 0

  get current(): number {
    return this.value
  }

  /** Returns the status after raising; a lower floor is a no-op. */
  raiseFloor(minimum: number): number {
    if (minimum > this.value) this.value = minimum
    return this.value
  }
}
