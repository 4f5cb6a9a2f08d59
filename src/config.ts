type Env = Record<string, string | undefined>;

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

const MIN_POLL_INTERVAL_SECONDS = 5;

function stringEnvVar(env: Env, envVarName: string): string;
function stringEnvVar(env: Env, envVarName: string, defaultValue: string): string;
function stringEnvVar(
  env: Env,
  envVarName: string,
  defaultValue: null,
): string | undefined;
function stringEnvVar(
  env: Env,
  envVarName: string,
  defaultValue?: string | null,
): string | undefined {
  // Blank values count as unset, add-on supervisors export empty options
  const raw = env[envVarName]?.trim();
  const value = raw != null && raw.length > 0 ? raw : undefined;
  if (value == null && defaultValue === undefined) {
    throw new ConfigError(`Missing env var ${envVarName}`);
  }
  return value ?? defaultValue ?? undefined;
}

function intEnvVar(env: Env, envVarName: string, defaultValue: number): number {
  const value = stringEnvVar(env, envVarName, null);
  if (value == null) {
    return defaultValue;
  }
  const parsed = Number.parseInt(value, 10);
  if (Number.isNaN(parsed)) {
    throw new ConfigError(`Env var ${envVarName} is not an integer: ${value}`);
  }
  return parsed;
}

function boolEnvVar(env: Env, envVarName: string, defaultValue = false): boolean {
  const value = stringEnvVar(env, envVarName, null);
  if (value == null) {
    return defaultValue;
  }
  return ["1", "true", "yes", "on"].includes(value.toLowerCase());
}

export function getConfig(env: Env = process.env) {
  return {
    token: stringEnvVar(env, "ST_TOKEN"),
    apiBase: stringEnvVar(env, "ST_API_BASE", "https://api.smartthings.com/v1"),
    httpTimeout: intEnvVar(env, "HTTP_TIMEOUT_SECONDS", 20),
    mqttHost: stringEnvVar(env, "MQTT_HOST", "core-mosquitto"),
    mqttPort: intEnvVar(env, "MQTT_PORT", 1883),
    mqttUsername: stringEnvVar(env, "MQTT_USER", null),
    mqttPassword: stringEnvVar(env, "MQTT_PASSWORD", null),
    mqttClientId: stringEnvVar(env, "MQTT_CLIENT_ID", "smartthings2mqtt"),
    mqttTopic: stringEnvVar(env, "MQTT_TOPIC_PREFIX", "smartthings").replace(
      /^\/+|\/+$/g,
      "",
    ),
    discoveryPrefix: stringEnvVar(env, "DISCOVERY_PREFIX", "homeassistant"),
    pollInterval: Math.max(
      MIN_POLL_INTERVAL_SECONDS,
      intEnvVar(env, "POLL_INTERVAL_SECONDS", 30),
    ),
    publishDiscovery: boolEnvVar(env, "PUBLISH_DISCOVERY", true),
    publishChunkSize: Math.max(1, intEnvVar(env, "PUBLISH_CHUNK_SIZE", 10)),
    verbose: boolEnvVar(env, "VERBOSE", false),
  };
}

export type Config = ReturnType<typeof getConfig>;

export function mqttUrl(config: Config): string {
  return `mqtt://${config.mqttHost}:${config.mqttPort}`;
}

export function anonymizeConfig(config: Config): Config {
  return {
    ...config,
    token: "***",
    mqttPassword: config.mqttPassword != null ? "***" : undefined,
  };
}
