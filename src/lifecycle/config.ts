// Identifier of the tmux session hosting every instance window, unless overridden.
export const DEFAULT_SESSION_NAME = "flotilla";

// Server artifact staged into each instance directory.
export const DEFAULT_ARTIFACT_NAME = "server.ts";

// Captured stdout/stderr inside an instance directory.
export const INSTANCE_LOG_FILE = "out.log";

// Archive of captured output, relative to the working directory.
export const BACKUP_DIR_NAME = ".backup";

// Environment binding carrying the instance name into the launched process.
export const INSTANCE_NAME_ENV = "INSTANCE_NAME";

export const INSTANCE_NAME_PATTERN = /^[a-z]{1,32}$/;

// tmux diagnostics meaning the session vanished between probe and kill.
export const SESSION_GONE_PATTERNS = [/can't find session/i, /no server running/i];

export const LOG_PREFIX = "[flotilla]";
