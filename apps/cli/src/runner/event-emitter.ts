import type { TUIEvent } from "../tui/matrix-tui-types.js";

type Listener = (event: TUIEvent) => void;

/**
 * Type-safe event channel from the matrix runner to whoever renders
 * progress (the TUI, or the plain line printer).
 *
 * Events emitted while nobody listens are held and replayed, in order, to
 * the next listener that subscribes. The TUI only subscribes once it has
 * mounted, which is after the runner has already announced its start.
 */
export class MatrixEventEmitter {
  private readonly listeners = new Set<Listener>();
  private pending: TUIEvent[] = [];

  /**
   * @returns Unsubscribe function
   */
  on(listener: Listener): () => void {
    this.listeners.add(listener);
    const backlog = this.pending;
    this.pending = [];
    for (const event of backlog) {
      listener(event);
    }
    return () => {
      this.listeners.delete(listener);
    };
  }

  emit(event: TUIEvent): void {
    if (this.listeners.size === 0) {
      this.pending.push(event);
      return;
    }
    for (const listener of [...this.listeners]) {
      listener(event);
    }
  }
}
