// Log lines shown under each instance by `check_status`.
export const CHECK_STATUS_LOG_TAIL_LINES = 5;

export const GET_OUTPUT_DEFAULT_LINES = 100;
