// packages/core/src/utils/constants.ts — Shared magic number constants

/** Worker idle poll interval in milliseconds */
export const DEFAULT_POLL_MS = 2000;

/** Upper bound for the worker's idle backoff in milliseconds */
export const DEFAULT_MAX_IDLE_MS = 30_000;

/** A claim whose heartbeat is older than this is treated as abandoned */
export const DEFAULT_CLAIM_LEASE_MS = 60_000;

/** Per-client request budget for the gateway's /api routes, per window */
export const DEFAULT_RATE_LIMIT = 120;

/** Gateway rate limit window in seconds */
export const DEFAULT_RATE_WINDOW_SEC = 60;

/** Events kept per client, on both sides of the wire */
export const EVENT_BUFFER_SIZE = 200;

/** Events replayed to a newly connected stream client */
export const DEFAULT_REPLAY = 50;

/** Seconds of silence before the gateway sends a heartbeat frame */
export const DEFAULT_HEARTBEAT_SEC = 15;

/** How often the gateway checks the log for rows written by other processes */
export const DEFAULT_FEED_POLL_MS = 250;

/** Client poll interval once the push channel is down */
export const DEFAULT_CLIENT_POLL_MS = 5000;

/** Client delay between push reconnect attempts */
export const DEFAULT_PUSH_RETRY_MS = 15_000;

/** Hard cap for the `n` parameter of the recent-events endpoint */
export const MAX_RECENT_EVENTS = 1000;

/** Default collaborator command timeout in seconds */
export const COLLABORATOR_TIMEOUT_SEC = 900;

/** Max collaborator output kept in an event payload */
export const OUTPUT_MAX_CHARS = 4000;

/** Gateway listen port */
export const DEFAULT_PORT = 8787;

/** systemd user unit running the worker */
export const DEFAULT_WORKER_UNIT = 'vigil-worker.service';
