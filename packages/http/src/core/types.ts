/**
 * Side effects the client depends on, replaceable in tests
 */
export interface HttpEffects {
  fetch: typeof fetch;
  now: () => number;
}
