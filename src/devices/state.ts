import lodash from "lodash";
import type { DeviceApi } from "../api.js";
import type { Logger } from "../logger.js";
import type { DeviceRecord, JsonValue } from "../models.js";
import type { MessagePublisher } from "../publish.js";
import { OFFLINE, ONLINE, type Topics } from "../topics.js";
import { encodeCanonical } from "../utils.js";
import { type AttributeMap, attributeValueToJson, extractAttributes } from "./attributes.js";
import type { HomeAssistantDiscovery } from "./homeassistant.js";
import { deviceLabel } from "./homeassistant-utils.js";
import { type StateStore, attributeCacheKey } from "./store.js";

const { chunk } = lodash;

export type PublishResult = "published" | "unchanged" | "offline";

export type StateDocument = Record<string, JsonValue>;

/**
 * State document without its refresh timestamp.
 *
 * Every attribute is keyed by its dot-path. Main-component attributes also get a
 * `capability.attribute` alias unless a real key already uses that name.
 */
export function buildStateDocument(
  deviceId: string,
  device: DeviceRecord | undefined,
  attributes: AttributeMap,
): StateDocument {
  const document: StateDocument = {
    device_id: deviceId,
    name: deviceLabel(deviceId, device),
  };
  for (const attr of attributes.values()) {
    document[attr.key] = attributeValueToJson(attr.value);
  }
  for (const attr of attributes.values()) {
    if (attr.component !== "main") {
      continue;
    }
    const legacyKey = `${attr.capability}.${attr.attribute}`;
    if (!Object.hasOwn(document, legacyKey)) {
      document[legacyKey] = attributeValueToJson(attr.value);
    }
  }
  return document;
}

export interface StatePublisherOptions {
  api: Pick<DeviceApi, "getDeviceStatus">;
  publisher: MessagePublisher;
  store: StateStore;
  topics: Topics;
  logger: Logger;
  /** Omitted when discovery is disabled. */
  discovery?: HomeAssistantDiscovery;
  /** Per-attribute publishes sent concurrently. */
  publishChunkSize?: number;
  /** Milliseconds since the epoch. */
  clock?: () => number;
}

/**
 * Fetches device status and mirrors it to MQTT when it changed.
 */
export class StatePublisher {
  private readonly clock: () => number;

  private readonly publishChunkSize: number;

  constructor(private readonly options: StatePublisherOptions) {
    this.clock = options.clock ?? Date.now;
    this.publishChunkSize = Math.max(1, options.publishChunkSize ?? 10);
  }

  /**
   * Refresh one device. Publishes the full state, changed attribute topics and
   * availability when the state differs from the last publish, or always when `force` is set.
   * Errors mark the device offline and leave the caches as they were.
   */
  async publishDeviceState(deviceId: string, force = false): Promise<PublishResult> {
    const { api, publisher, store, topics, logger, discovery } = this.options;
    try {
      const status = await api.getDeviceStatus(deviceId);
      const attributes = extractAttributes(status);
      const device = store.getDevice(deviceId);
      const document = buildStateDocument(deviceId, device, attributes);
      // The timestamp changes every cycle, so it is left out of the comparison
      const fingerprint = encodeCanonical(document);
      const changed = store.getFullState(deviceId) !== fingerprint;

      if (changed || force) {
        const updatedAt = Math.floor(this.clock() / 1000);
        await publisher.publish(
          topics.state(deviceId),
          encodeCanonical({ ...document, updated_at: updatedAt }),
          { retain: true },
        );
        const sent = await this.publishAttributes(deviceId, attributes, force);
        logger.log(`Published state for ${deviceId} (${sent} attribute topics)`);
      }
      if (changed || force || store.getAvailability(deviceId) !== ONLINE) {
        await publisher.publish(topics.availability(deviceId), ONLINE, { retain: true });
        store.setAvailability(deviceId, ONLINE);
      }
      if (changed || force) {
        store.setFullState(deviceId, fingerprint);
      }

      if (discovery) {
        await discovery.publishDevice(deviceId, device, attributes);
      }
      return changed || force ? "published" : "unchanged";
    } catch (err) {
      logger.error(`Unable to fetch or publish status for ${deviceId}:`, err);
      await this.markOffline(deviceId);
      return "offline";
    }
  }

  private async publishAttributes(
    deviceId: string,
    attributes: AttributeMap,
    force: boolean,
  ): Promise<number> {
    const { publisher, store, topics } = this.options;
    const pending = [...attributes.values()]
      .map((attr) => ({
        topic: topics.attributeState(deviceId, attr.component, attr.capability, attr.attribute),
        cacheKey: attributeCacheKey(deviceId, attr.component, attr.capability, attr.attribute),
        encoded: encodeCanonical(attributeValueToJson(attr.value)),
      }))
      .filter(({ cacheKey, encoded }) => force || store.getAttributeState(cacheKey) !== encoded);

    for (const batch of chunk(pending, this.publishChunkSize)) {
      await Promise.all(
        batch.map(({ topic, encoded }) => publisher.publish(topic, encoded, { retain: true })),
      );
      for (const { cacheKey, encoded } of batch) {
        store.setAttributeState(cacheKey, encoded);
      }
    }
    return pending.length;
  }

  private async markOffline(deviceId: string): Promise<void> {
    const { publisher, store, topics, logger } = this.options;
    try {
      await publisher.publish(topics.availability(deviceId), OFFLINE, { retain: true });
      store.setAvailability(deviceId, OFFLINE);
    } catch (err) {
      logger.error(`Unable to mark ${deviceId} offline:`, err);
    }
  }
}
