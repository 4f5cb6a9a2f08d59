import type { DeviceRecord } from "../models.js";
import type { Availability } from "../topics.js";

/**
 * Process-wide bridge caches. Entries are never evicted; `clear()` is the only reset.
 */
export class StateStore {
  private readonly devices = new Map<string, DeviceRecord>();

  /** Change fingerprint of the last published full state, per device. */
  private readonly fullState = new Map<string, string>();

  /** Last published encoding per device+component+capability+attribute. */
  private readonly attributeState = new Map<string, string>();

  private readonly availability = new Map<string, Availability>();

  /** Discovery object ids already published. */
  private readonly discovery = new Set<string>();

  upsertDevice(device: DeviceRecord): void {
    this.devices.set(device.deviceId, device);
  }

  getDevice(deviceId: string): DeviceRecord | undefined {
    return this.devices.get(deviceId);
  }

  getFullState(deviceId: string): string | undefined {
    return this.fullState.get(deviceId);
  }

  setFullState(deviceId: string, encoded: string): void {
    this.fullState.set(deviceId, encoded);
  }

  getAttributeState(cacheKey: string): string | undefined {
    return this.attributeState.get(cacheKey);
  }

  setAttributeState(cacheKey: string, encoded: string): void {
    this.attributeState.set(cacheKey, encoded);
  }

  getAvailability(deviceId: string): Availability | undefined {
    return this.availability.get(deviceId);
  }

  setAvailability(deviceId: string, availability: Availability): void {
    this.availability.set(deviceId, availability);
  }

  hasDiscovery(objectId: string): boolean {
    return this.discovery.has(objectId);
  }

  markDiscovery(objectId: string): void {
    this.discovery.add(objectId);
  }

  clear(): void {
    this.devices.clear();
    this.fullState.clear();
    this.attributeState.clear();
    this.availability.clear();
    this.discovery.clear();
  }
}

export function attributeCacheKey(
  deviceId: string,
  component: string,
  capability: string,
  attribute: string,
): string {
  return `${deviceId}|${component}|${capability}|${attribute}`;
}
