import type { CommandEnvelope, DeviceCommand, JsonValue } from "./models.js";
import {
  ARGUMENT_COMMANDS,
  DEVICE_TEXT_COMMANDS,
  KNOWN_COMPONENT,
  TEXT_COMMANDS,
} from "./devices/capabilities.js";
import { isRecord, lookup, toJsonValue } from "./utils.js";

/**
 * Inbound MQTT payload, classified by shape. Every non-empty variant keeps the
 * trimmed text for the plain-text fallbacks.
 */
export type InboundPayload =
  | { kind: "empty" }
  | { kind: "object"; value: Record<string, unknown>; text: string }
  | { kind: "number"; value: number; text: string }
  | { kind: "text"; text: string };

export function parsePayload(payloadText: string): InboundPayload {
  const text = payloadText.trim();
  if (text.length === 0) {
    return { kind: "empty" };
  }
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch {
    return { kind: "text", text };
  }
  if (isRecord(parsed)) {
    return { kind: "object", value: parsed, text };
  }
  if (typeof parsed === "number") {
    return { kind: "number", value: parsed, text };
  }
  // JSON strings, lists, booleans and null are handled as text
  return { kind: "text", text };
}

function toArguments(raw: unknown): JsonValue[] {
  return Array.isArray(raw) ? raw.map(toJsonValue) : [toJsonValue(raw)];
}

function single(
  component: string,
  capability: string,
  command: string,
  args?: JsonValue[],
): CommandEnvelope {
  const entry: DeviceCommand = { component, capability, command };
  if (args !== undefined) {
    entry.arguments = args;
  }
  return { commands: [entry] };
}

/**
 * A `{"commands": [...]}` envelope is forwarded as given; the device API
 * validates its entries.
 */
function readEnvelope(value: Record<string, unknown>): CommandEnvelope | null {
  const { commands } = value;
  return Array.isArray(commands) ? { ...value, commands } : null;
}

const INTEGER = /^[+-]?\d+$/;
const DECIMAL = /^[+-]?(\d+\.\d*|\.\d+)(e[+-]?\d+)?$/i;

/**
 * Argument for single-argument commands: a number when the text reads as one,
 * otherwise the text itself.
 */
export function coerceArgument(text: string): number | string {
  const pattern = text.includes(".") ? DECIMAL : INTEGER;
  return pattern.test(text) ? Number(text) : text;
}

/**
 * Translate a payload sent to `{prefix}/{device}/set` or `{prefix}/{device}/command`.
 *
 * Accepts a full envelope, a single `{capability, command}` object (component
 * defaults to main) or one of the words on/off, lock/unlock, open/close.
 */
export function parseDeviceCommand(payloadText: string): CommandEnvelope | null {
  const payload = parsePayload(payloadText);
  if (payload.kind === "empty") {
    return null;
  }
  if (payload.kind === "object") {
    const { value } = payload;
    if (Object.hasOwn(value, "commands")) {
      return readEnvelope(value);
    }
    const { component, capability, command } = value;
    if (typeof capability === "string" && typeof command === "string") {
      return single(
        typeof component === "string" ? component : KNOWN_COMPONENT,
        capability,
        command,
        value.arguments !== undefined ? toArguments(value.arguments) : undefined,
      );
    }
  }
  const word = payload.text.toLowerCase();
  const capability = lookup(DEVICE_TEXT_COMMANDS, word);
  return capability ? single(KNOWN_COMPONENT, capability, word) : null;
}

/**
 * Translate a payload sent to `{prefix}/{device}/{component}/{capability}/set`.
 *
 * Unknown text is forwarded as the command verb, so capabilities without a
 * table entry can still be driven.
 */
export function parseCapabilityCommand(
  payloadText: string,
  component: string,
  capability: string,
): CommandEnvelope | null {
  const payload = parsePayload(payloadText);
  switch (payload.kind) {
    case "empty":
      return null;
    case "object": {
      const { value } = payload;
      if (Object.hasOwn(value, "commands")) {
        return readEnvelope(value);
      }
      if (typeof value.command === "string") {
        return single(
          component,
          capability,
          value.command,
          value.arguments !== undefined ? toArguments(value.arguments) : undefined,
        );
      }
      break;
    }
    case "number":
      return single(component, capability, "setLevel", [payload.value]);
    case "text":
      break;
  }

  const { text } = payload;
  const textCommands = lookup(TEXT_COMMANDS, capability);
  const verb = textCommands && lookup(textCommands, text.toLowerCase());
  if (verb) {
    return single(component, capability, verb);
  }
  const argumentCommand = lookup(ARGUMENT_COMMANDS, capability);
  if (argumentCommand) {
    return single(component, capability, argumentCommand, [coerceArgument(text)]);
  }
  return single(component, capability, text);
}
