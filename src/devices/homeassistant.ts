import type { DeviceRecord } from "../models.js";
import type { Logger } from "../logger.js";
import type { MessagePublisher } from "../publish.js";
import type { EntityDomain, Topics } from "../topics.js";
import { lookup } from "../utils.js";
import type { Attribute, AttributeMap, AttributeValue } from "./attributes.js";
import {
  BINARY_SENSOR_VOCABULARY,
  KNOWN_COMPONENT,
  KNOWN_NUMBERS,
  KNOWN_SELECTS,
  KNOWN_SWITCHES,
  SENSOR_DEVICE_CLASSES,
} from "./capabilities.js";
import {
  type DiscoveryDevice,
  type DiscoveryOrigin,
  ORIGIN,
  deviceLabel,
  deviceMetadata,
  entityObjectId,
  numberCommandTemplate,
  selectCommandTemplate,
  valueTemplate,
} from "./homeassistant-utils.js";
import type { StateStore } from "./store.js";

/**
 * Entity fields of a Home Assistant MQTT discovery document.
 */
export interface EntityConfig {
  name: string;
  unique_id: string;
  state_topic: string;
  command_topic?: string;
  value_template?: string;
  state_value_template?: string;
  command_template?: string;
  payload_on?: string | boolean;
  payload_off?: string | boolean;
  state_on?: string;
  state_off?: string;
  state_locked?: string;
  state_unlocked?: string;
  payload_lock?: string;
  payload_unlock?: string;
  options?: string[];
  min?: number;
  max?: number;
  step?: number;
  mode?: "slider" | "box";
  unit_of_measurement?: string;
  device_class?: string;
  state_class?: "measurement";
}

export interface DiscoveryConfig extends EntityConfig {
  device: DiscoveryDevice;
  origin: DiscoveryOrigin;
  availability_topic: string;
}

export interface DiscoveryMessage {
  domain: EntityDomain;
  objectId: string;
  topic: string;
  config: DiscoveryConfig;
}

function isScalar(value: AttributeValue): boolean {
  return value.kind === "boolean" || value.kind === "number" || value.kind === "string";
}

function isLockAttribute(attr: Attribute): boolean {
  return attr.capability === "lock" && ["lock", "lockState"].includes(attr.attribute);
}

/**
 * Derive discovery documents for one device from its flattened attributes.
 *
 * Known control capabilities on the main component are matched first and claim
 * their attributes; every remaining scalar attribute falls through to a generic
 * rule chain (binary sensor, switch/lock, plain sensor). Composite and absent
 * values produce nothing.
 */
export function synthesizeDiscovery(
  deviceId: string,
  device: DeviceRecord | undefined,
  attributes: AttributeMap,
  topics: Topics,
): DiscoveryMessage[] {
  const label = deviceLabel(deviceId, device);
  const shared = {
    device: deviceMetadata(deviceId, device),
    origin: ORIGIN,
    availability_topic: topics.availability(deviceId),
  };
  const stateTopic = topics.state(deviceId);
  const claimed = new Set<string>();
  const messages: DiscoveryMessage[] = [];

  const emit = (
    domain: EntityDomain,
    attr: Attribute,
    name: string,
    entity: Omit<EntityConfig, "name" | "unique_id" | "state_topic">,
  ) => {
    const objectId = entityObjectId(deviceId, attr.key);
    claimed.add(attr.key);
    messages.push({
      domain,
      objectId,
      topic: topics.discovery(domain, objectId),
      config: {
        name,
        state_topic: stateTopic,
        unique_id: objectId,
        ...entity,
        ...shared,
      },
    });
  };
  const knownKey = (capability: string, attribute: string) =>
    `${KNOWN_COMPONENT}.${capability}.${attribute}`;
  const commandTopic = (attr: Attribute) =>
    topics.capabilitySet(deviceId, attr.component, attr.capability);
  const emitLock = (attr: Attribute, name: string) =>
    emit("lock", attr, name, {
      command_topic: commandTopic(attr),
      value_template: valueTemplate(attr.key),
      state_locked: "locked",
      state_unlocked: "unlocked",
      payload_lock: "lock",
      payload_unlock: "unlock",
    });

  for (const known of KNOWN_SWITCHES) {
    const attr = attributes.get(knownKey(known.capability, known.attribute));
    if (!attr || !isScalar(attr.value)) {
      continue;
    }
    emit("switch", attr, `${label} ${known.label}`, {
      command_topic: commandTopic(attr),
      state_value_template: valueTemplate(attr.key),
      payload_on: known.payloadOn,
      payload_off: known.payloadOff,
      state_on: known.stateOn,
      state_off: known.stateOff,
    });
  }

  for (const known of KNOWN_NUMBERS) {
    const attr = attributes.get(knownKey(known.capability, known.attribute));
    if (!attr || attr.value.kind !== "number") {
      continue;
    }
    emit("number", attr, `${label} ${known.label}`, {
      command_topic: commandTopic(attr),
      value_template: valueTemplate(attr.key),
      command_template: numberCommandTemplate(known.command),
      min: known.min,
      max: known.max,
      step: known.step,
      mode: "slider",
      ...(attr.unit ? { unit_of_measurement: attr.unit } : {}),
    });
  }

  for (const known of KNOWN_SELECTS) {
    const attr = attributes.get(knownKey(known.capability, known.attribute));
    const supported = attributes.get(knownKey(known.capability, known.supportedAttribute));
    if (!attr || attr.value.kind !== "string" || !supported) {
      continue;
    }
    const supportedValue = supported.value;
    if (supportedValue.kind !== "list") {
      continue;
    }
    const options = supportedValue.value.filter(
      (option): option is string => typeof option === "string" && option.length > 0,
    );
    if (options.length === 0) {
      continue;
    }
    emit("select", attr, `${label} ${known.label}`, {
      command_topic: commandTopic(attr),
      value_template: valueTemplate(attr.key),
      options,
      command_template: selectCommandTemplate(known.command),
    });
  }

  for (const attr of attributes.values()) {
    if (claimed.has(attr.key)) {
      continue;
    }
    const name = `${label} ${attr.component} ${attr.capability} ${attr.attribute}`;
    const template = valueTemplate(attr.key);
    const { value } = attr;

    switch (value.kind) {
      case "list":
      case "object":
      case "absent":
        // Entities need a scalar state
        continue;
      case "boolean":
        emit("binary_sensor", attr, name, {
          value_template: template,
          payload_on: true,
          payload_off: false,
        });
        continue;
      case "string": {
        const vocabulary = lookup(BINARY_SENSOR_VOCABULARY, attr.attribute.toLowerCase());
        if (vocabulary) {
          emit("binary_sensor", attr, name, {
            value_template: template,
            payload_on: vocabulary.on,
            payload_off: vocabulary.off,
            device_class: vocabulary.deviceClass,
          });
          continue;
        }
        if (
          attr.capability === "switch" &&
          attr.attribute === "switch" &&
          ["on", "off"].includes(value.value.toLowerCase())
        ) {
          emit("switch", attr, name, {
            command_topic: commandTopic(attr),
            state_value_template: template,
            payload_on: "on",
            payload_off: "off",
            state_on: "on",
            state_off: "off",
          });
          continue;
        }
        if (isLockAttribute(attr)) {
          emitLock(attr, name);
          continue;
        }
        break;
      }
      case "number":
        if (isLockAttribute(attr)) {
          emitLock(attr, name);
          continue;
        }
        break;
    }

    const sensorClass = lookup(SENSOR_DEVICE_CLASSES, attr.capability);
    const unit = attr.unit ?? sensorClass?.defaultUnit;
    emit("sensor", attr, name, {
      value_template: template,
      ...(value.kind === "number" ? { state_class: "measurement" as const } : {}),
      ...(unit ? { unit_of_measurement: unit } : {}),
      ...(sensorClass ? { device_class: sensorClass.deviceClass } : {}),
    });
  }

  return messages;
}

export interface HomeAssistantDiscoveryOptions {
  publisher: MessagePublisher;
  store: StateStore;
  topics: Topics;
  logger: Logger;
}

/**
 * Publishes discovery documents, each object id at most once per process.
 */
export class HomeAssistantDiscovery {
  constructor(private readonly options: HomeAssistantDiscoveryOptions) {}

  /**
   * Publish the documents not yet sent for this device. Returns how many went out.
   */
  async publishDevice(
    deviceId: string,
    device: DeviceRecord | undefined,
    attributes: AttributeMap,
  ): Promise<number> {
    const { publisher, store, topics, logger } = this.options;
    let published = 0;
    for (const message of synthesizeDiscovery(deviceId, device, attributes, topics)) {
      if (store.hasDiscovery(message.objectId)) {
        continue;
      }
      await publisher.publishJson(message.topic, message.config, { retain: true });
      store.markDiscovery(message.objectId);
      published += 1;
    }
    if (published > 0) {
      logger.log(`Published ${published} discovery documents for ${deviceId}`);
    }
    return published;
  }
}
