import { memo, useEffect, useRef, type KeyboardEvent, type ReactElement } from 'react';
import type { ListPosition, Navigator } from '../lib/navigator';
import type { NavigatorRow } from '../lib/render';
import { useNavigator } from '../hooks/useNavigator';
import { toLoadError, type LoadError } from '../hooks/useReviewLoader';

interface NavigatorPanelProps {
  navigator: Navigator;
  onError: (error: LoadError) => void;
  // Set for nested commit sessions
  nested?: boolean;
}

function isCurrent(cursor: ListPosition | null, section: ListPosition['section'], index: number): boolean {
  return cursor?.section === section && cursor.index === index;
}

/**
 * Session header, commit chain and changed files. Nested commit sessions
 * are shown in place of their parent until closed.
 */
function NavigatorPanelView({ navigator, onError, nested = false }: NavigatorPanelProps): ReactElement {
  const snapshot = useNavigator(navigator);
  const listRef = useRef<HTMLDivElement>(null);
  const { header, commits, files } = navigator.rows;

  // Keep keyboard focus on the list when coming back from a view
  useEffect(() => {
    if (snapshot.status === 'listing' && !snapshot.child) {
      listRef.current?.focus();
    }
  }, [snapshot.status, snapshot.child]);

  if (snapshot.child) {
    return <NavigatorPanelView key={snapshot.child.session.comparison.head} navigator={snapshot.child} onError={onError} nested />;
  }

  const activate = (position: ListPosition) => {
    navigator.select(position);
    navigator.activateCursor().catch((err: unknown) => onError(toLoadError(err)));
  };

  const handleKeyDown = (e: KeyboardEvent<HTMLDivElement>) => {
    switch (e.key) {
      case 'ArrowDown':
      case 'j':
        navigator.moveCursor(1);
        break;
      case 'ArrowUp':
      case 'k':
        navigator.moveCursor(-1);
        break;
      case 'Enter':
        navigator.activateCursor().catch((err: unknown) => onError(toLoadError(err)));
        break;
      case 'Escape':
      case 'q':
        if (nested) navigator.close();
        break;
      default:
        return;
    }
    e.preventDefault();
  };

  const renderRow = (row: NavigatorRow, section: ListPosition['section'], index: number, open: boolean) => (
    <div
      key={row.key}
      className={`navigator-row ${section} ${isCurrent(snapshot.cursor, section, index) ? 'current' : ''} ${open ? 'open' : ''}`}
      onClick={() => activate({ section, index })}
    >
      <span className="navigator-row-text">{row.text}</span>
      {open && <span className="navigator-row-open-indicator">●</span>}
    </div>
  );

  return (
    <div className="navigator-panel">
      <div className="navigator-header">
        {nested && (
          <button className="navigator-back-btn" onClick={() => navigator.close()}>
            ← Back
          </button>
        )}
        {header.map((line, i) => (
          <div key={i} className={i === 0 ? 'navigator-title' : 'navigator-header-line'}>{line}</div>
        ))}
      </div>

      <div className="navigator-list" ref={listRef} tabIndex={0} onKeyDown={handleKeyDown}>
        {commits.length > 0 && <div className="navigator-section-title">Commits</div>}
        {commits.map((row, i) => renderRow(row, 'commit', i, snapshot.openCommits.includes(i)))}

        <div className="navigator-section-title">Files</div>
        {files.length === 0 && <div className="navigator-empty">No files changed</div>}
        {files.map((row, i) => renderRow(row, 'file', i, snapshot.openFiles.includes(i)))}
      </div>
    </div>
  );
}

export const NavigatorPanel = memo(NavigatorPanelView);
