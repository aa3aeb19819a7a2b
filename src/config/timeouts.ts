/**
 * Centralized timeout configuration.
 *
 * Backend calls are bounded by the provider SDKs' own request timeout; the
 * engine treats a timeout like any other backend failure.
 */

/**
 * Timeout values in milliseconds
 */
export const TIMEOUTS = {
  /**
   * Timeout for a single backend generation request (5 minutes)
   * Used for: chapter text, recaps, arc briefs, summary compression
   */
  AI_REQUEST: 300000,

  /**
   * Timeout for testing AI connections (30 seconds)
   */
  TEST_CONNECTION: 30000,

  /**
   * Interval between SSE keep-alive comments (15 seconds)
   */
  SSE_KEEPALIVE: 15000,
} as const;

/**
 * Helper to get timeout in seconds (for display purposes)
 */
export function getTimeoutInSeconds(timeout: number): number {
  return Math.round(timeout / 1000);
}
