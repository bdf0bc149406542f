import type { ClosableView, ComparisonRequest, ComparisonViewer } from "./navigator";

export interface ComparisonPane {
  id: number;
  request: ComparisonRequest;
}

export interface ComparisonStoreSnapshot {
  panes: ComparisonPane[];
  focusedId: number | null;
}

/**
 * Open two-pane comparisons, shown by ComparisonView. A request whose key
 * is already open focuses that pane and shares it. Closing a pane (from
 * the UI or from any navigator holding it) notifies its listeners once.
 */
export class ComparisonStore implements ComparisonViewer {
  private panes: ComparisonPane[] = [];
  private focusedId: number | null = null;
  private nextId = 1;
  private readonly closeListeners = new Map<number, Set<() => void>>();
  private readonly listeners = new Set<() => void>();
  private snapshot: ComparisonStoreSnapshot = { panes: [], focusedId: null };

  open(request: ComparisonRequest): ClosableView {
    const existing = this.panes.find((pane) => pane.request.key === request.key);
    if (existing) {
      this.focus(existing.id);
      return this.handle(existing.id);
    }

    const id = this.nextId++;
    this.panes = [...this.panes, { id, request }];
    this.closeListeners.set(id, new Set());
    this.focusedId = id;
    this.emit();
    return this.handle(id);
  }

  private handle(id: number): ClosableView {
    return {
      focus: () => this.focus(id),
      close: () => this.close(id),
      onClose: (listener) => {
        this.closeListeners.get(id)?.add(listener);
      },
    };
  }

  focus(id: number): void {
    if (!this.panes.some((pane) => pane.id === id)) return;
    this.focusedId = id;
    this.emit();
  }

  close(id: number): void {
    const listeners = this.closeListeners.get(id);
    if (!listeners) return;

    this.closeListeners.delete(id);
    this.panes = this.panes.filter((pane) => pane.id !== id);
    if (this.focusedId === id) {
      this.focusedId = this.panes.length > 0 ? this.panes[this.panes.length - 1].id : null;
    }
    this.emit();

    for (const listener of listeners) {
      listener();
    }
  }

  subscribe = (listener: () => void): (() => void) => {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  };

  getSnapshot = (): ComparisonStoreSnapshot => this.snapshot;

  private emit(): void {
    this.snapshot = { panes: this.panes, focusedId: this.focusedId };
    for (const listener of this.listeners) {
      listener();
    }
  }
}
