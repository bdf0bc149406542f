import type { LoadError } from '../../hooks/useReviewLoader';

interface ErrorStateProps {
  error: LoadError | null;
  onRetry?: () => void;
  onDismiss?: () => void;
}

/**
 * Shows a failure as reported, with the GitHub status and URL when there
 * is one
 */
export function ErrorState({ error, onRetry, onDismiss }: ErrorStateProps) {
  if (!error) return null;

  return (
    <div className="error-banner" role="alert">
      <div className="error-title">
        {error.status !== null ? `Request failed (${error.status})` : 'Request failed'}
      </div>
      <div className="error-details">{error.message}</div>
      {error.url && <div className="error-url">{error.url}</div>}
      {error.status === 401 || error.status === 403 || error.status === 404 ? (
        <div className="error-hint">
          Check the reference, and that GITHUB_TOKEN can read this repository.
        </div>
      ) : null}
      <div className="error-actions">
        {onRetry && (
          <button className="error-retry-btn" onClick={onRetry}>
            Retry
          </button>
        )}
        {onDismiss && (
          <button className="error-dismiss-btn" onClick={onDismiss}>
            Dismiss
          </button>
        )}
      </div>
    </div>
  );
}
