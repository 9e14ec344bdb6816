/**
 * DFX API deployments and measurement limits
 */

export const SERVERS = {
  qa: {
    restUrl: "https://qa.api.deepaffex.ai:9443",
    websocketUrl: "wss://qa.api.deepaffex.ai:9080",
  },
  dev: {
    restUrl: "https://dev.api.deepaffex.ai:9443",
    websocketUrl: "wss://dev.api.deepaffex.ai:9080",
  },
  demo: {
    restUrl: "https://demo.api.deepaffex.ai:9443",
    websocketUrl: "wss://demo.api.deepaffex.ai:9080",
  },
  prod: {
    restUrl: "https://api.deepaffex.ai:9443",
    websocketUrl: "wss://api.deepaffex.ai:9080",
  },
  "prod-cn": {
    restUrl: "https://api.deepaffex.cn:9443",
    websocketUrl: "wss://api.deepaffex.cn:9080",
  },
  "demo-cn": {
    restUrl: "https://demo.api.deepaffex.cn:9443",
    websocketUrl: "wss://demo.api.deepaffex.cn:9080",
  },
} as const;

export type ServerId = keyof typeof SERVERS;

export type ServerUrls = { restUrl: string; websocketUrl: string };

// Longest measurement the server accepts per mode, in seconds
export const MEASUREMENT_MODE_MAX_SECONDS = {
  DISCRETE: 120,
  BATCH: 1200,
  VIDEO: 1200,
  STREAMING: 1200,
} as const;

export type MeasurementMode = keyof typeof MEASUREMENT_MODE_MAX_SECONDS;

export function isServerId(value: string): value is ServerId {
  return Object.hasOwn(SERVERS, value);
}

export function isMeasurementMode(value: string): value is MeasurementMode {
  return Object.hasOwn(MEASUREMENT_MODE_MAX_SECONDS, value);
}

export function resolveServer(server: string): ServerUrls {
  const id = server.toLowerCase();
  if (!isServerId(id)) {
    throw new RangeError(
      `Invalid server id "${server}" (expected one of ${Object.keys(SERVERS).join(", ")})`
    );
  }
  return SERVERS[id];
}

export const DEFAULT_DEVICE_NAME = "DFX desktop";
export const CLIENT_IDENTIFIER = "DFXCLIENT";
export const CLIENT_VERSION = "1.0.0";
