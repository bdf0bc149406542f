// Context providers and hooks for shared state
export { ComparisonProvider, useComparisonContext } from './ComparisonContext';
