/**
 * Static capability tables shared by discovery and command translation.
 */

export interface KnownSwitch {
  capability: string;
  attribute: string;
  label: string;
  payloadOn: string;
  payloadOff: string;
  stateOn: string;
  stateOff: string;
}

export interface KnownNumber {
  capability: string;
  attribute: string;
  label: string;
  command: string;
  min: number;
  max: number;
  step: number;
}

export interface KnownSelect {
  capability: string;
  attribute: string;
  /** Sibling attribute listing the allowed options. */
  supportedAttribute: string;
  label: string;
  command: string;
}

/** Controls are only synthesized for the primary component. */
export const KNOWN_COMPONENT = "main";

export const KNOWN_SWITCHES: readonly KnownSwitch[] = [
  {
    capability: "switch",
    attribute: "switch",
    label: "Power",
    payloadOn: "on",
    payloadOff: "off",
    stateOn: "on",
    stateOff: "off",
  },
  {
    capability: "audioMute",
    attribute: "mute",
    label: "Mute",
    payloadOn: "mute",
    payloadOff: "unmute",
    stateOn: "muted",
    stateOff: "unmuted",
  },
];

export const KNOWN_NUMBERS: readonly KnownNumber[] = [
  {
    capability: "audioVolume",
    attribute: "volume",
    label: "Volume",
    command: "setVolume",
    min: 0,
    max: 100,
    step: 1,
  },
  {
    capability: "switchLevel",
    attribute: "level",
    label: "Level",
    command: "setLevel",
    min: 0,
    max: 100,
    step: 1,
  },
];

interface SelectFamily {
  capabilities: string[];
  attribute: string;
  supportedAttribute: string;
  label: string;
  command: string;
}

// Standard capability first, then the vendor-namespaced variant
const SELECT_FAMILIES: SelectFamily[] = [
  {
    capabilities: ["mediaInputSource", "samsungvd.mediaInputSource"],
    attribute: "inputSource",
    supportedAttribute: "supportedInputSources",
    label: "Input Source",
    command: "setInputSource",
  },
  {
    capabilities: ["custom.picturemode", "samsungvd.pictureMode"],
    attribute: "pictureMode",
    supportedAttribute: "supportedPictureModes",
    label: "Picture Mode",
    command: "setPictureMode",
  },
  {
    capabilities: ["custom.soundmode", "samsungvd.soundMode"],
    attribute: "soundMode",
    supportedAttribute: "supportedSoundModes",
    label: "Sound Mode",
    command: "setSoundMode",
  },
  {
    capabilities: ["ovenMode", "samsungce.ovenMode"],
    attribute: "ovenMode",
    supportedAttribute: "supportedOvenModes",
    label: "Oven Mode",
    command: "setOvenMode",
  },
];

export const KNOWN_SELECTS: readonly KnownSelect[] = SELECT_FAMILIES.flatMap(
  ({ capabilities, ...rest }) => capabilities.map((capability) => ({ capability, ...rest })),
);

/**
 * Text-valued attributes reported as binary sensors, keyed by lowercased attribute name.
 */
export const BINARY_SENSOR_VOCABULARY: Readonly<
  Record<string, { on: string; off: string; deviceClass: string }>
> = {
  contact: { on: "open", off: "closed", deviceClass: "door" },
  motion: { on: "active", off: "inactive", deviceClass: "motion" },
  water: { on: "wet", off: "dry", deviceClass: "moisture" },
  presence: { on: "present", off: "not present", deviceClass: "presence" },
  occupancy: { on: "occupied", off: "unoccupied", deviceClass: "occupancy" },
  smoke: { on: "detected", off: "clear", deviceClass: "smoke" },
};

export const SENSOR_DEVICE_CLASSES: Readonly<
  Record<string, { deviceClass: string; defaultUnit?: string }>
> = {
  temperatureMeasurement: { deviceClass: "temperature" },
  relativeHumidityMeasurement: { deviceClass: "humidity" },
  battery: { deviceClass: "battery" },
  illuminanceMeasurement: { deviceClass: "illuminance", defaultUnit: "lx" },
};

/**
 * Plain-text payloads accepted on a capability set topic, mapped to the command verb.
 */
export const TEXT_COMMANDS: Readonly<Record<string, Readonly<Record<string, string>>>> = {
  switch: { on: "on", off: "off" },
  lock: { lock: "lock", unlock: "unlock", locked: "lock", unlocked: "unlock" },
  doorControl: { open: "open", close: "close", closed: "close" },
  audioMute: {
    mute: "mute",
    unmute: "unmute",
    muted: "mute",
    unmuted: "unmute",
    on: "mute",
    off: "unmute",
  },
};

/**
 * Capabilities whose set command takes the payload as its single argument.
 */
export const ARGUMENT_COMMANDS: Readonly<Record<string, string>> = {
  audioVolume: "setVolume",
  switchLevel: "setLevel",
  ...Object.fromEntries(
    SELECT_FAMILIES.flatMap(({ capabilities, command }) =>
      capabilities.map((capability) => [capability, command]),
    ),
  ),
};

/**
 * Plain-text payloads accepted on the whole-device topics.
 */
export const DEVICE_TEXT_COMMANDS: Readonly<Record<string, string>> = {
  on: "switch",
  off: "switch",
  lock: "lock",
  unlock: "lock",
  open: "doorControl",
  close: "doorControl",
};
