import type { DeviceRecord } from "../models.js";
import { sanitizeId } from "../utils.js";

/**
 * Device block shared by every entity of one device,
 * so Home Assistant groups them under a single device entry.
 */
export interface DiscoveryDevice {
  identifiers: string[];
  name: string;
  manufacturer: string;
  model: string;
  sw_version: string;
}

export interface DiscoveryOrigin {
  name: string;
  sw_version: string;
}

export const ORIGIN: DiscoveryOrigin = {
  name: "smartthings2mqtt",
  sw_version: "1.0.0",
};

const DEFAULT_MANUFACTURER = "Samsung";
const DEFAULT_MODEL = "SmartThings Device";

/**
 * Display name of a device: label, then name, then the id itself.
 */
export function deviceLabel(deviceId: string, device: DeviceRecord | undefined): string {
  return device?.label || device?.name || deviceId;
}

export function deviceIdentifier(deviceId: string): string {
  return `smartthings_${deviceId}`;
}

export function deviceMetadata(
  deviceId: string,
  device: DeviceRecord | undefined,
): DiscoveryDevice {
  return {
    identifiers: [deviceIdentifier(deviceId)],
    name: deviceLabel(deviceId, device),
    manufacturer: device?.manufacturerName || DEFAULT_MANUFACTURER,
    model: device?.deviceTypeName || DEFAULT_MODEL,
    sw_version: device?.firmwareVersion || "",
  };
}

/**
 * Object id of an entity, also used as its unique_id.
 * "dev1", "main.switch.switch" -> "smartthings_dev1_main_switch_switch"
 */
export function entityObjectId(deviceId: string, attributeKey: string): string {
  return `${deviceIdentifier(deviceId)}_${sanitizeId(attributeKey)}`;
}

/**
 * Template reading one attribute out of the full state document.
 * Keys contain dots, hence the subscript form.
 */
export function valueTemplate(attributeKey: string): string {
  return `{{ value_json['${attributeKey}'] }}`;
}

/**
 * Command body for number entities; renders into a capability set payload.
 */
export function numberCommandTemplate(command: string): string {
  return `{"command":"${command}","arguments":[{{ value | float }}]}`;
}

/**
 * Command body for select entities; the chosen option is sent as a string argument.
 */
export function selectCommandTemplate(command: string): string {
  return `{"command":"${command}","arguments":["{{ value }}"]}`;
}
