import { useEffect } from "react";
import { useApp } from "ink";
import { useReviewSelector, type ReviewStore } from "./index";

export const TICK_MS = 250;

/**
 * Housekeeping around input handling: the periodic tick, review
 * submission once its request has been rendered, and exit.
 */
export function useEventLoop(store: ReviewStore) {
  const { exit } = useApp();
  const submitRequest = useReviewSelector((s) => s.submitRequest);
  const shouldQuit = useReviewSelector((s) => s.shouldQuit);

  useEffect(() => {
    const id = setInterval(store.tick, TICK_MS);
    return () => clearInterval(id);
  }, [store]);

  // Effects run after the commit, so the frame that left the input mode is on screen
  useEffect(() => {
    if (submitRequest) {
      void store.submitPendingReview();
    }
  }, [store, submitRequest]);

  useEffect(() => {
    if (shouldQuit) exit();
  }, [exit, shouldQuit]);
}
