export const ONLINE = "online";
export const OFFLINE = "offline";

export type Availability = typeof ONLINE | typeof OFFLINE;

export type EntityDomain =
  | "switch"
  | "number"
  | "select"
  | "lock"
  | "binary_sensor"
  | "sensor";

export type CommandTopic =
  | { kind: "device"; deviceId: string }
  | { kind: "capability"; deviceId: string; component: string; capability: string };

/**
 * Topic layout below a configurable prefix.
 */
export class Topics {
  readonly prefix: string;

  private readonly prefixSegments: string[];

  constructor(
    prefix: string,
    readonly discoveryPrefix = "homeassistant",
  ) {
    this.prefix = prefix.replace(/^\/+|\/+$/g, "");
    this.prefixSegments = this.prefix.split("/");
  }

  state(deviceId: string): string {
    return `${this.prefix}/${deviceId}/state`;
  }

  attributeState(
    deviceId: string,
    component: string,
    capability: string,
    attribute: string,
  ): string {
    return `${this.prefix}/${deviceId}/${component}/${capability}/${attribute}/state`;
  }

  availability(deviceId: string): string {
    return `${this.prefix}/${deviceId}/availability`;
  }

  set(deviceId: string): string {
    return `${this.prefix}/${deviceId}/set`;
  }

  command(deviceId: string): string {
    return `${this.prefix}/${deviceId}/command`;
  }

  capabilitySet(deviceId: string, component: string, capability: string): string {
    return `${this.prefix}/${deviceId}/${component}/${capability}/set`;
  }

  bridgeStatus(): string {
    return `${this.prefix}/bridge/status`;
  }

  discovery(domain: EntityDomain, objectId: string): string {
    return `${this.discoveryPrefix}/${domain}/${objectId}/config`;
  }

  /** Subscription patterns for inbound commands. */
  commandSubscriptions(): string[] {
    return [
      `${this.prefix}/+/set`,
      `${this.prefix}/+/command`,
      `${this.prefix}/+/+/+/set`,
    ];
  }

  /**
   * Classify an inbound topic. Returns null for topics outside the prefix
   * or without a device segment.
   */
  parse(topic: string): CommandTopic | null {
    const segments = topic.split("/");
    for (let i = 0; i < this.prefixSegments.length; i += 1) {
      if (segments[i] !== this.prefixSegments[i]) {
        return null;
      }
    }
    const rest = segments.slice(this.prefixSegments.length);
    if (rest.length === 4 && rest[3] === "set") {
      return {
        kind: "capability",
        deviceId: rest[0],
        component: rest[1],
        capability: rest[2],
      };
    }
    if (rest.length >= 2 && rest[0].length > 0) {
      return { kind: "device", deviceId: rest[0] };
    }
    return null;
  }
}
