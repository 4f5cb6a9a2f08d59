import type { JsonValue } from "../models.js";
import { isRecord, toJsonValue } from "../utils.js";

/**
 * Attribute value as reported by the device API, tagged by shape.
 */
export type AttributeValue =
  | { kind: "boolean"; value: boolean }
  | { kind: "number"; value: number }
  | { kind: "string"; value: string }
  | { kind: "list"; value: JsonValue[] }
  | { kind: "object"; value: { [key: string]: JsonValue } }
  | { kind: "absent" };

export interface Attribute {
  /** `component.capability.attribute` */
  key: string;
  component: string;
  capability: string;
  attribute: string;
  value: AttributeValue;
  unit?: string;
}

export type AttributeMap = Map<string, Attribute>;

export function toAttributeValue(raw: unknown): AttributeValue {
  if (typeof raw === "boolean") {
    return { kind: "boolean", value: raw };
  }
  if (typeof raw === "number" && Number.isFinite(raw)) {
    return { kind: "number", value: raw };
  }
  if (typeof raw === "string") {
    return { kind: "string", value: raw };
  }
  if (Array.isArray(raw)) {
    return { kind: "list", value: raw.map(toJsonValue) };
  }
  if (isRecord(raw)) {
    const value: { [key: string]: JsonValue } = {};
    for (const [key, item] of Object.entries(raw)) {
      value[key] = toJsonValue(item);
    }
    return { kind: "object", value };
  }
  return { kind: "absent" };
}

export function attributeValueToJson(value: AttributeValue): JsonValue {
  return value.kind === "absent" ? null : value.value;
}

/**
 * Flatten a `GET devices/{id}/status` document into
 * `component.capability.attribute` keyed attributes.
 * Levels that are not objects are skipped, so a partial document yields fewer attributes.
 */
export function extractAttributes(status: unknown): AttributeMap {
  const result: AttributeMap = new Map();
  if (!isRecord(status) || !isRecord(status.components)) {
    return result;
  }
  for (const [component, componentPayload] of Object.entries(status.components)) {
    if (!isRecord(componentPayload)) {
      continue;
    }
    for (const [capability, capabilityPayload] of Object.entries(componentPayload)) {
      if (!isRecord(capabilityPayload)) {
        continue;
      }
      for (const [attribute, attributePayload] of Object.entries(capabilityPayload)) {
        if (!isRecord(attributePayload)) {
          continue;
        }
        const key = `${component}.${capability}.${attribute}`;
        const unit = attributePayload.unit;
        result.set(key, {
          key,
          component,
          capability,
          attribute,
          value: toAttributeValue(attributePayload.value),
          ...(typeof unit === "string" && unit.length > 0 ? { unit } : {}),
        });
      }
    }
  }
  return result;
}
