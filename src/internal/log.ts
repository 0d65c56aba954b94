/** Write a tagged diagnostic line when debugging is enabled. */
export function debugLog(enabled: boolean, tag: string, payload: unknown): void {
  if (!enabled) return;
  // eslint-disable-next-line no-console
  console.log(`[${tag}]`, payload);
}
