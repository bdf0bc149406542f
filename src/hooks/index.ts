export { useNavigator } from './useNavigator';
export { useReviewLoader, toLoadError, type LoadError } from './useReviewLoader';
