export interface ControlPlaneTimingConfig {
  doctorPollIntervalMs?: number;
  doctorGracePeriodMs?: number;
  stopTimeoutMs?: number;
  stopPollIntervalMs?: number;
  scheduleTimeoutMs?: number;
  schedulePollIntervalMs?: number;
  helloTimeoutMs?: number;
  restartDelayMs?: number;
}

export interface IdentifyPropertiesConfig {
  os?: string;
  browser?: string;
  device?: string;
}

export interface GatewireConfig {
  token?: string;
  tokenEnvVar?: string;
  intents?: number;
  identify?: IdentifyPropertiesConfig;
  apiBaseUrl?: string;
  apiVersion?: number;
  gatewayUrl?: string;
  timing?: ControlPlaneTimingConfig;
  eventQueueCapacity?: number;
  logLevel?: string;
}

export function defineConfig<T extends GatewireConfig>(config: T): T {
  return config;
}
