export type JsonPrimitive = string | number | boolean | null;

export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };

/**
 * A device as returned by `GET devices`.
 * Only the fields the bridge reads are typed; the rest is passed through.
 */
export interface DeviceRecord {
  deviceId: string;
  name?: string;
  label?: string;
  manufacturerName?: string;
  deviceTypeName?: string;
  firmwareVersion?: string;
  [key: string]: unknown;
}

export interface DeviceListResponse {
  items?: unknown[];
  _links?: {
    next?: { href?: string } | null;
  };
}

export interface AttributeStatus {
  value?: unknown;
  unit?: string;
  timestamp?: string;
}

/**
 * Response of `GET devices/{id}/status`:
 * component -> capability -> attribute -> { value, unit }.
 */
export interface DeviceStatusResponse {
  components?: Record<string, Record<string, Record<string, AttributeStatus>>>;
}

export interface DeviceCommand {
  component: string;
  capability: string;
  command: string;
  arguments?: JsonValue[];
}

/**
 * Body of `POST devices/{id}/commands`. Envelopes received over MQTT are
 * forwarded as given, so their entries stay untyped.
 */
export interface CommandEnvelope {
  commands: unknown[];
  [key: string]: unknown;
}
