import type { Commit, FileCoordinates, Repository, ReviewSession } from "./review";
import { repositoryName, shortSha } from "./review";
import { renderSession, type ActivationEvent, type NavigatorRow, type NavigatorRows } from "./render";

// ============================================
// COLLABORATORS
// ============================================

export interface ComparisonSide {
  revision: string;
  path: string;
  // "" when the file does not exist on this side
  content: string;
}

export interface ComparisonRequest {
  key: string;
  label: string;
  base: ComparisonSide;
  head: ComparisonSide;
}

/** Something the navigator opened and waits on to close */
export interface ClosableView {
  focus(): void;
  close(): void;
  onClose(listener: () => void): void;
}

export interface ComparisonViewer {
  open(request: ComparisonRequest): ClosableView;
}

export interface NavigatorDeps {
  resolveContent(repository: Repository, revision: string, path: string): Promise<string>;
  openCommitSession(repository: Repository, commit: Commit): Promise<ReviewSession>;
  viewer: ComparisonViewer;
}

// ============================================
// STATE
// ============================================

export type NavigatorStatus = "listing" | "viewing" | "closed";

export interface ListPosition {
  section: "commit" | "file";
  index: number;
}

export interface NavigatorSnapshot {
  status: NavigatorStatus;
  cursor: ListPosition | null;
  // Row whose view was opened or focused last
  focused: ListPosition | null;
  openFiles: number[];
  openCommits: number[];
  // Nested session shown on top of this one
  child: Navigator | null;
}

export class NavigatorClosedError extends Error {
  constructor() {
    super("Navigator is closed");
    this.name = "NavigatorClosedError";
  }
}

function samePosition(a: ListPosition | null, b: ListPosition | null): boolean {
  return a !== null && b !== null && a.section === b.section && a.index === b.index;
}

export function comparisonRequest(coordinates: FileCoordinates, baseContent: string, headContent: string): ComparisonRequest {
  const { repository, baseRevision, headRevision, path, basePath } = coordinates;
  const shownPath = basePath === path ? path : `${basePath} → ${path}`;

  return {
    key: `${repositoryName(repository)}:${path}:${baseRevision}..${headRevision}`,
    label: `${repositoryName(repository)}: ${shownPath} @ ${shortSha(baseRevision)}..${shortSha(headRevision)}`,
    base: { revision: baseRevision, path: basePath, content: baseContent },
    head: { revision: headRevision, path, content: headContent },
  };
}

/**
 * Drill-down controller over one review session.
 *
 * listing -> viewing when a file comparison or a nested commit session
 * opens; back to listing (cursor on the originating row) when the last
 * one closes; closed is terminal. At most one live view per row.
 */
export class Navigator implements ClosableView {
  readonly session: ReviewSession;
  readonly rows: NavigatorRows;

  private readonly deps: NavigatorDeps;
  private status: NavigatorStatus = "listing";
  private cursor: ListPosition | null;
  private focused: ListPosition | null = null;
  private activeChild: Navigator | null = null;

  private readonly fileViews = new Map<number, ClosableView>();
  private readonly commitViews = new Map<number, Navigator>();
  private readonly pending = new Map<string, Promise<void>>();

  private readonly listeners = new Set<() => void>();
  private readonly closeListeners = new Set<() => void>();
  private snapshot: NavigatorSnapshot;

  constructor(session: ReviewSession, deps: NavigatorDeps) {
    this.session = session;
    this.deps = deps;
    this.rows = renderSession(session);
    this.cursor = this.positions()[0] ?? null;
    this.snapshot = this.buildSnapshot();
  }

  // Arrow properties so React can pass them around unbound
  subscribe = (listener: () => void): (() => void) => {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  };

  getSnapshot = (): NavigatorSnapshot => this.snapshot;

  onClose(listener: () => void): void {
    this.closeListeners.add(listener);
  }

  focus(): void {
    if (this.status === "closed") return;
    this.emit();
  }

  // ============================================
  // CURSOR
  // ============================================

  /** Selectable rows, commits first */
  positions(): ListPosition[] {
    return [
      ...this.rows.commits.map((_, index): ListPosition => ({ section: "commit", index })),
      ...this.rows.files.map((_, index): ListPosition => ({ section: "file", index })),
    ];
  }

  rowAt(position: ListPosition): NavigatorRow {
    const row = position.section === "commit" ? this.rows.commits[position.index] : this.rows.files[position.index];
    if (!row) {
      throw new RangeError(`No ${position.section} row at index ${position.index}`);
    }
    return row;
  }

  select(position: ListPosition): void {
    this.assertOpen();
    this.rowAt(position);
    this.cursor = { ...position };
    this.emit();
  }

  moveCursor(delta: number): void {
    this.assertOpen();
    const positions = this.positions();
    if (positions.length === 0) return;

    const current = positions.findIndex((position) => samePosition(position, this.cursor));
    const next = Math.min(Math.max((current === -1 ? 0 : current) + delta, 0), positions.length - 1);
    this.cursor = positions[next];
    this.emit();
  }

  activateCursor(): Promise<void> {
    if (this.status === "closed") return Promise.reject(new NavigatorClosedError());
    if (!this.cursor) return Promise.resolve();
    return this.dispatch(this.rowAt(this.cursor).activation);
  }

  // ============================================
  // ACTIVATION
  // ============================================

  activateFile(index: number): Promise<void> {
    return this.dispatch(this.rowAt({ section: "file", index }).activation);
  }

  activateCommit(index: number): Promise<void> {
    return this.dispatch(this.rowAt({ section: "commit", index }).activation);
  }

  /**
   * Open (or re-focus) the view for an activated row. Errors reach the
   * caller and leave no view registered.
   */
  dispatch(event: ActivationEvent): Promise<void> {
    if (this.status === "closed") return Promise.reject(new NavigatorClosedError());

    const key = `${event.type}:${event.index}`;
    const inFlight = this.pending.get(key);
    if (inFlight) return inFlight;

    const opening = event.type === "file"
      ? this.openFile(event.index, event.coordinates)
      : this.openCommit(event.index, event.commit);
    this.pending.set(key, opening);

    const forget = () => {
      this.pending.delete(key);
    };
    opening.then(forget, forget);
    return opening;
  }

  private async openFile(index: number, coordinates: FileCoordinates): Promise<void> {
    const origin: ListPosition = { section: "file", index };
    this.cursor = origin;

    const live = this.fileViews.get(index);
    if (live) {
      live.focus();
      this.markViewing(origin);
      return;
    }

    const { repository, baseRevision, headRevision, path, basePath } = coordinates;
    const baseContent = await this.deps.resolveContent(repository, baseRevision, basePath);
    const headContent = await this.deps.resolveContent(repository, headRevision, path);
    if (this.status === "closed") return;

    const view = this.deps.viewer.open(comparisonRequest(coordinates, baseContent, headContent));
    this.fileViews.set(index, view);
    view.onClose(() => {
      if (this.fileViews.get(index) === view) {
        this.fileViews.delete(index);
      }
      this.restore(origin);
    });
    this.markViewing(origin);
  }

  private async openCommit(index: number, commit: Commit): Promise<void> {
    const origin: ListPosition = { section: "commit", index };
    this.cursor = origin;

    const live = this.commitViews.get(index);
    if (live) {
      this.activeChild = live;
      live.focus();
      this.markViewing(origin);
      return;
    }

    const nested = await this.deps.openCommitSession(this.session.comparison.repository, commit);
    if (this.status === "closed") return;

    const child = new Navigator(nested, this.deps);
    this.commitViews.set(index, child);
    this.activeChild = child;
    child.onClose(() => {
      if (this.commitViews.get(index) === child) {
        this.commitViews.delete(index);
      }
      if (this.activeChild === child) {
        this.activeChild = null;
      }
      this.restore(origin);
    });
    this.markViewing(origin);
  }

  private markViewing(origin: ListPosition): void {
    this.status = "viewing";
    this.focused = origin;
    this.emit();
  }

  // A view closed: put the cursor back on the row that opened it
  private restore(origin: ListPosition): void {
    if (this.status === "closed") return;

    this.cursor = origin;
    if (this.fileViews.size === 0 && this.commitViews.size === 0) {
      this.status = "listing";
      this.focused = null;
    } else if (samePosition(this.focused, origin)) {
      this.focused = null;
    }
    this.emit();
  }

  // ============================================
  // TEARDOWN
  // ============================================

  close(): void {
    if (this.status === "closed") return;
    this.status = "closed";

    const views: ClosableView[] = [...this.fileViews.values(), ...this.commitViews.values()];
    this.fileViews.clear();
    this.commitViews.clear();
    this.activeChild = null;
    this.focused = null;
    for (const view of views) {
      view.close();
    }

    this.emit();
    for (const listener of [...this.closeListeners]) {
      listener();
    }
    this.closeListeners.clear();
  }

  private assertOpen(): void {
    if (this.status === "closed") {
      throw new NavigatorClosedError();
    }
  }

  private buildSnapshot(): NavigatorSnapshot {
    return {
      status: this.status,
      cursor: this.cursor,
      focused: this.focused,
      openFiles: [...this.fileViews.keys()].sort((a, b) => a - b),
      openCommits: [...this.commitViews.keys()].sort((a, b) => a - b),
      child: this.activeChild,
    };
  }

  private emit(): void {
    this.snapshot = this.buildSnapshot();
    for (const listener of this.listeners) {
      listener();
    }
  }
}
