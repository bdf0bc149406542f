interface LoadingStateProps {
  reference: string | null;
}

/**
 * Full-page loading state while the comparison is fetched
 */
export function LoadingState({ reference }: LoadingStateProps) {
  return (
    <div className="loading-page">
      <div className="loading-icon-wrapper">
        <svg className="loading-icon diff" viewBox="0 0 24 24" fill="none" stroke="currentColor" strokeWidth="2">
          <path d="M16 3h5v5M8 3H3v5M3 16v5h5M21 16v5h-5"/>
          <path d="M21 3L14 10M3 21l7-7"/>
        </svg>
        <div className="loading-spinner"></div>
      </div>
      <div className="loading-text">
        Loading comparison…
        {reference && <div className="loading-repo">{reference}</div>}
      </div>
    </div>
  );
}
