export const DEFAULT_API_BASE_URL = "https://discord.com/api";
export const DEFAULT_API_VERSION = 10;
export const DEFAULT_TOKEN_ENV_VAR = "DISCORD_BOT_TOKEN";
export const DEFAULT_INTENTS = 0x01ffff;
export const DEFAULT_EVENT_QUEUE_CAPACITY = 100;
export const DEFAULT_CLIENT_NAME = "gatewire";

export const DEFAULT_DOCTOR_POLL_INTERVAL_MS = 1_000;
export const DEFAULT_DOCTOR_GRACE_PERIOD_MS = 5_000;
export const DEFAULT_STOP_TIMEOUT_MS = 5_000;
export const DEFAULT_STOP_POLL_INTERVAL_MS = 100;
export const DEFAULT_SCHEDULE_TIMEOUT_MS = 30_000;
export const DEFAULT_SCHEDULE_POLL_INTERVAL_MS = 100;
export const DEFAULT_HELLO_TIMEOUT_MS = 30_000;
export const DEFAULT_RESTART_DELAY_MS = 1_000;
export const DEFAULT_SOCKET_BUFFERED_FRAMES = 100;
