export const DEFAULT_API_HOST = "https://live-open.biliapi.com";
export const DEFAULT_DATA_DIR_NAME = ".openlive-relay";

export const DEFAULT_HEARTBEAT_INTERVAL_SECONDS = 20;
export const MIN_HEARTBEAT_INTERVAL_SECONDS = 5;
/** Protocol-level keep-alive on the socket, independent of the REST heartbeat. */
export const SOCKET_HEARTBEAT_INTERVAL_MS = 20_000;

export const REQUEST_TIMEOUT_MS = 10_000;
export const CONNECT_TIMEOUT_MS = 10_000;

export const SOCKET_PATH_SUFFIX = "/sub";
export const EVENT_QUEUE_CAPACITY = 64;
