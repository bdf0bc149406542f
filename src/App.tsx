import { useEffect, useMemo, useState } from 'react';
import { Link } from 'react-router-dom';
import { ComparisonStore } from './lib/comparisonStore';
import { ComparisonProvider } from './contexts';
import { useReviewLoader, type LoadError } from './hooks';
import { NavigatorPanel } from './components/NavigatorPanel';
import { ComparisonView } from './components/ComparisonView';
import { ErrorState } from './components/common/ErrorState';
import { LoadingState } from './components/common/LoadingState';

interface AppProps {
  reference: string | null;
}

export default function App({ reference }: AppProps) {
  // One pane store per page; panes outlive navigator re-renders
  const store = useMemo(() => new ComparisonStore(), []);
  const { navigator, loading, error, load } = useReviewLoader(store);
  // Failures of activations inside an open session
  const [actionError, setActionError] = useState<LoadError | null>(null);

  useEffect(() => {
    if (reference) {
      void load(reference);
    }
  }, [reference, load]);

  if (!reference) {
    return (
      <div className="app">
        <ErrorState error={{ message: 'Not a pull request or commit reference', status: null, url: null }} />
        <Link to="/">Back</Link>
      </div>
    );
  }

  if (loading && !navigator) {
    return <LoadingState reference={reference} />;
  }

  if (error && !navigator) {
    return (
      <div className="app">
        <ErrorState error={error} onRetry={() => void load(reference)} />
      </div>
    );
  }

  return (
    <ComparisonProvider store={store}>
      <div className="app review-layout">
        <aside className="review-sidebar">
          {navigator && <NavigatorPanel navigator={navigator} onError={setActionError} />}
        </aside>
        <main className="review-main">
          <ErrorState error={actionError ?? error} onDismiss={() => setActionError(null)} />
          <ComparisonView />
        </main>
      </div>
    </ComparisonProvider>
  );
}
