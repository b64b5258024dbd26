/**
 * Shared constants for relaytest
 * Keep values environment-agnostic and dependency-free.
 */

/**
 * Time given to a freshly spawned relay binary before it is considered up.
 *
 * relay-server has no RPC interface of its own, so there is no readiness
 * signal to wait for. This sleep is the only synchronization we have and
 * is a known source of flakiness on slow machines.
 */
export const DEFAULT_STARTUP_GRACE_MS = 1000;

/** Bound on the wait for a stopped process to exit before it counts as leaked */
export const DEFAULT_STOP_TIMEOUT_MS = 10_000;

/** Interval at which the RPC endpoint checks whether its listener has closed */
export const SHUTDOWN_POLL_INTERVAL_MS = 100;

/** Time after which the RPC endpoint drops connections that are still open */
export const DEFAULT_SHUTDOWN_GRACE_MS = 2000;

/** How long a call must stay blocked for assertStillPending to hold */
export const DEFAULT_PENDING_CHECK_MS = 100;

/** Pause between two spammer iterations, taken outside the spammer lock */
export const DEFAULT_SPAM_INTERVAL_MS = 10;

/** Range the per-fixture port counter starts from */
export const PORT_RANGE_MIN = 1024;
export const PORT_RANGE_MAX = 30_000;

/** Environment variable the relay binaries read their log directory from */
export const DEFAULT_LOG_DIR_VARIABLE = 'GLOG_log_dir';

/** Binary names looked up in the build directory */
export const RELAY_CLIENT_BINARY = 'relay-client';
export const RELAY_SERVER_BINARY = 'relay-server';

/** Prefix of the per-fixture temporary working directory */
export const WORKDIR_PREFIX = 'relaytest-';

/** Method used by the harness to stop a relay-client out of band */
export const CLIENT_STOP_METHOD = 'stop';
