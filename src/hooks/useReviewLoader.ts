import { useState, useRef, useCallback, useEffect } from "react";
import { fetchContent, openCommitReview, openReview, ApiRequestError } from "../lib/api";
import { Navigator } from "../lib/navigator";
import type { ComparisonStore } from "../lib/comparisonStore";

export interface LoadError {
  message: string;
  status: number | null;
  url: string | null;
}

interface ReviewLoaderState {
  navigator: Navigator | null;
  loading: boolean;
  error: LoadError | null;
}

export function toLoadError(err: unknown): LoadError {
  if (err instanceof ApiRequestError) {
    return { message: err.message, status: err.upstreamStatus ?? err.status, url: err.upstreamUrl };
  }
  return { message: err instanceof Error ? err.message : "Unknown error", status: null, url: null };
}

/**
 * Opens a review session for a reference and owns its navigator.
 * A navigator is closed when a new one replaces it or on unmount.
 */
export function useReviewLoader(store: ComparisonStore) {
  const [state, setState] = useState<ReviewLoaderState>({
    navigator: null,
    loading: false,
    error: null,
  });
  // Guards against a slow load finishing after a newer one
  const loadIdRef = useRef(0);

  const load = useCallback(async (reference: string) => {
    const loadId = ++loadIdRef.current;
    setState(prev => ({ ...prev, loading: true, error: null }));

    try {
      const session = await openReview(reference);
      if (loadId !== loadIdRef.current) return;

      const navigator = new Navigator(session, {
        resolveContent: fetchContent,
        openCommitSession: openCommitReview,
        viewer: store,
      });
      setState({ navigator, loading: false, error: null });
    } catch (err) {
      if (loadId !== loadIdRef.current) return;
      setState(prev => ({ ...prev, loading: false, error: toLoadError(err) }));
    }
  }, [store]);

  const navigator = state.navigator;
  useEffect(() => () => navigator?.close(), [navigator]);

  return { ...state, load };
}
