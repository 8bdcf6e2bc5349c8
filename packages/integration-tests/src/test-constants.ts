/**
 * Shared Test Constants
 *
 * Centralized timeouts, secrets and harness configuration for all scenario
 * tests. These keep CI/local differences explicit.
 */

import type { HarnessConfig, NodeSecrets } from '@clusterkit/harness';

// Detect CI environment
export const isCI = process.env['CI'] === 'true' || !!process.env['GITHUB_ACTIONS'];

/**
 * Timeout multiplier for CI environments.
 * CI runners are typically slower, so we increase timeouts.
 */
export const CI_MULTIPLIER = 2;

/**
 * Apply CI multiplier to a timeout value
 */
export const ciTimeout = (baseMs: number): number => (isCI ? baseMs * CI_MULTIPLIER : baseMs);

/**
 * Standard timeout categories. All values in milliseconds.
 */
export const TIMEOUTS = {
  /** Node startup against the in-process stand-ins */
  STAND_IN_STARTUP: ciTimeout(5_000),

  /** Node startup against the real binaries */
  STARTUP: ciTimeout(10_000),

  /** Storage node registration */
  REGISTRATION: ciTimeout(2_000),

  /** Graceful shutdown before SIGKILL */
  SHUTDOWN: ciTimeout(10_000),
} as const;

/**
 * Polling intervals for wait operations
 */
export const POLL_INTERVALS = {
  /** Health polling against stand-ins */
  FAST: 20,

  /** Health polling against real binaries */
  HEALTH_CHECK: 500,
} as const;

/**
 * Placeholder secrets shared by every node of a test cluster.
 * The admin password is also the authorization header value.
 * The encryption key must be 32 characters long.
 */
export const TEST_SECRETS: NodeSecrets = {
  registrationSecret: 'test-secret',
  adminPassword: 'test-password',
  encryptionKey: 'test-encryption-key-000000000000',
};

/**
 * Harness configuration for clusters of in-process stand-ins: no cooldown,
 * fast polling, loopback addresses only
 */
export function standInConfig(base: HarnessConfig): HarnessConfig {
  return {
    ...base,
    network: { host: '127.0.0.1' },
    process: {
      startupTimeout: TIMEOUTS.STAND_IN_STARTUP,
      pollInterval: POLL_INTERVALS.FAST,
      stopCooldown: 0,
      shutdownTimeout: TIMEOUTS.SHUTDOWN,
    },
    cluster: { registrationTimeout: TIMEOUTS.REGISTRATION },
  };
}
