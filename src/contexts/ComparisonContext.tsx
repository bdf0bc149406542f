import { createContext, useContext, useMemo, useSyncExternalStore, type ReactNode } from 'react';
import type { ComparisonStore, ComparisonStoreSnapshot } from '../lib/comparisonStore';

interface ComparisonContextType {
  store: ComparisonStore;
  snapshot: ComparisonStoreSnapshot;
}

const ComparisonContext = createContext<ComparisonContextType | null>(null);

interface ComparisonProviderProps {
  children: ReactNode;
  store: ComparisonStore;
}

/**
 * Provider for the open comparison panes
 * Changes whenever a pane opens, closes or takes focus
 */
export function ComparisonProvider({ children, store }: ComparisonProviderProps) {
  const snapshot = useSyncExternalStore(store.subscribe, store.getSnapshot);

  const value = useMemo<ComparisonContextType>(() => ({ store, snapshot }), [store, snapshot]);

  return (
    <ComparisonContext.Provider value={value}>
      {children}
    </ComparisonContext.Provider>
  );
}

/**
 * Hook to access the comparison panes
 * @throws Error if used outside ComparisonProvider
 */
export function useComparisonContext(): ComparisonContextType {
  const context = useContext(ComparisonContext);
  if (!context) {
    throw new Error('useComparisonContext must be used within a ComparisonProvider');
  }
  return context;
}
