import { memo, useMemo } from 'react';
import { Virtuoso } from 'react-virtuoso';
import type { ComparisonSide } from '../lib/navigator';
import { shortSha } from '../lib/review';
import { useComparisonContext } from '../contexts';

function splitLines(content: string): string[] {
  if (content === '') return [];
  const lines = content.split('\n');
  // Trailing newline is not an extra line
  if (lines[lines.length - 1] === '') lines.pop();
  return lines;
}

const SidePane = memo(function SidePane({ side, title }: { side: ComparisonSide; title: string }) {
  const lines = useMemo(() => splitLines(side.content), [side.content]);

  return (
    <div className="comparison-side">
      <div className="comparison-side-header">
        {title} · {side.path} @ {shortSha(side.revision)}
      </div>
      {lines.length === 0 ? (
        <div className="comparison-side-empty">File does not exist at this revision</div>
      ) : (
        <Virtuoso
          className="comparison-side-lines"
          data={lines}
          itemContent={(index, line) => (
            <div className="code-line">
              <span className="line-num">{index + 1}</span>
              <span className="line-content">{line}</span>
            </div>
          )}
        />
      )}
    </div>
  );
});

/**
 * Open comparisons as tabs; the focused one shows base and head side by side
 */
export function ComparisonView() {
  const { store, snapshot } = useComparisonContext();
  const { panes, focusedId } = snapshot;
  const focused = panes.find((pane) => pane.id === focusedId);

  if (panes.length === 0) {
    return (
      <div className="comparison-view empty">
        <div className="empty-state">Select a file to compare its two revisions</div>
      </div>
    );
  }

  return (
    <div className="comparison-view">
      <div className="comparison-tabs">
        {panes.map((pane) => (
          <div
            key={pane.request.key}
            className={`comparison-tab ${pane.id === focusedId ? 'active' : ''}`}
            onClick={() => store.focus(pane.id)}
            title={pane.request.label}
          >
            <span className="comparison-tab-name">{pane.request.head.path.split('/').pop()}</span>
            <button
              className="comparison-tab-close"
              onClick={(e) => {
                e.stopPropagation();
                store.close(pane.id);
              }}
            >
              ×
            </button>
          </div>
        ))}
      </div>
      {focused && (
        <>
          <div className="comparison-label">{focused.request.label}</div>
          <div className="comparison-panes">
            <SidePane key={`base:${focused.request.key}`} side={focused.request.base} title="Base" />
            <SidePane key={`head:${focused.request.key}`} side={focused.request.head} title="Head" />
          </div>
        </>
      )}
    </div>
  );
}
