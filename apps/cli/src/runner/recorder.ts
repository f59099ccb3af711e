/**
 * Holds the most recent raw service response so a job can save it.
 * Jobs run one at a time, so one slot is enough.
 */
export class ResponseRecorder {
  private last: unknown;

  record(body: unknown): void {
    this.last = body;
  }

  /**
   * Returns the recorded body and empties the slot.
   */
  take(): unknown {
    const body = this.last;
    this.last = undefined;
    return body;
  }
}
