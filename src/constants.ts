// Response/retry configuration
export const MAX_RETRIES = 3;
export const RETRY_DELAY_MS = 1000;

// Prefix for messages printed by the CLI itself
export const SYS_PREFIX = '[SYSTEM] ';
export const ERROR_PREFIX = '[ERROR] ';
