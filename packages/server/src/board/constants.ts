export const HISTORY_JOURNAL_FILE = "history.jsonl";

// The journal is rewritten once it holds more than this many times the history cap.
export const JOURNAL_COMPACT_FACTOR = 2;

export const BOARD_RATE_LIMIT_MAX_TRACKED_KEYS = 20_000;

export const WS_PATH = "/ws";
export const WS_MAX_INBOUND_MESSAGE_BYTES = 1024 * 1024;
export const WS_MAX_CONSECUTIVE_INVALID_PAYLOADS = 3;

// ws readyState value for an open socket.
export const WS_READY_STATE_OPEN = 1;
