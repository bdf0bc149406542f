import { useSyncExternalStore } from "react";
import type { Navigator, NavigatorSnapshot } from "../lib/navigator";

export function useNavigator(navigator: Navigator): NavigatorSnapshot {
  return useSyncExternalStore(navigator.subscribe, navigator.getSnapshot);
}
