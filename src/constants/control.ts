export const SERIAL_BAUD_RATE = 115_200;

export const COMMAND_ACK_TIMEOUT_MS = 5_000;
// M400 only answers once the planner queue has drained
export const MOTION_COMPLETION_TIMEOUT_MS = 60_000;
export const HOME_TIMEOUT_MS = 120_000;
export const POSITION_QUERY_WINDOW_MS = 2_000;

// Unsolicited lines (temperature auto-reports) kept between commands
export const MAX_STALE_LINES = 200;
export const MAX_PENDING_LINE_BYTES = 4_096;

export const PORT_PROBE_MAX_ATTEMPTS = 10;
export const PORT_PROBE_BACKOFF_MS = 2_000;

export const DEFAULT_FEEDRATE_MM_PER_MIN = 3_000;
export const AXIS_DECIMALS = 2;

export const LINEAR_MOVE_COMMAND = 'G1';
export const WAIT_FOR_MOVES_COMMAND = 'M400';
export const HOME_ALL_COMMAND = 'G28';
export const REPORT_POSITION_COMMAND = 'M114';
