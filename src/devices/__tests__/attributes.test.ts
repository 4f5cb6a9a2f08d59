import { describe, expect, it } from "vitest";
import {
  attributeValueToJson,
  extractAttributes,
  toAttributeValue,
} from "../attributes.js";
import { loadStatusFixture } from "../../__tests__/test-helpers.js";

describe("extractAttributes", () => {
  it("should flatten components into dot-path keys", () => {
    const attributes = extractAttributes(loadStatusFixture("tv-status.json"));

    expect([...attributes.keys()]).toEqual([
      "main.switch.switch",
      "main.audioVolume.volume",
      "main.audioMute.mute",
      "main.samsungvd.mediaInputSource.inputSource",
      "main.samsungvd.mediaInputSource.supportedInputSources",
      "main.custom.picturemode.pictureMode",
      "main.custom.picturemode.supportedPictureModes",
      "main.temperatureMeasurement.temperature",
      "main.contactSensor.contact",
      "main.ocf.mnmn",
      "main.ocf.n",
      "main.healthCheck.DeviceWatch-Enroll",
      "outlet1.switch.switch",
    ]);
  });

  it("should keep component, capability, attribute, value and unit", () => {
    const attributes = extractAttributes(loadStatusFixture("tv-status.json"));

    expect(attributes.get("main.audioVolume.volume")).toEqual({
      key: "main.audioVolume.volume",
      component: "main",
      capability: "audioVolume",
      attribute: "volume",
      value: { kind: "number", value: 15 },
      unit: "%",
    });
    expect(attributes.get("main.samsungvd.mediaInputSource.inputSource")).toEqual({
      key: "main.samsungvd.mediaInputSource.inputSource",
      component: "main",
      capability: "samsungvd.mediaInputSource",
      attribute: "inputSource",
      value: { kind: "string", value: "HDMI1" },
    });
  });

  it("should tag composite and missing values", () => {
    const attributes = extractAttributes(loadStatusFixture("tv-status.json"));

    expect(attributes.get("main.samsungvd.mediaInputSource.supportedInputSources")?.value).toEqual({
      kind: "list",
      value: ["digitalTv", "HDMI1", "HDMI2", ""],
    });
    expect(attributes.get("main.healthCheck.DeviceWatch-Enroll")?.value).toEqual({
      kind: "object",
      value: { protocol: "cloud", scheme: "untracked" },
    });
    expect(attributes.get("main.ocf.n")?.value).toEqual({ kind: "absent" });
  });

  it("should skip capability payloads that are not objects", () => {
    const attributes = extractAttributes({
      components: {
        main: {
          switch: "broken",
          battery: { battery: { value: 80, unit: "%" } },
          lock: ["not", "an", "object"],
        },
      },
    });

    expect([...attributes.keys()]).toEqual(["main.battery.battery"]);
  });

  it("should skip components and attributes that are not objects", () => {
    const attributes = extractAttributes({
      components: {
        main: 42,
        sub: { switch: { switch: "on", level: { value: 3 } } },
      },
    });

    expect([...attributes.keys()]).toEqual(["sub.switch.level"]);
  });

  it("should return nothing for documents without components", () => {
    expect(extractAttributes({}).size).toBe(0);
    expect(extractAttributes(null).size).toBe(0);
    expect(extractAttributes({ components: [] }).size).toBe(0);
  });

  it("should drop empty units", () => {
    const attributes = extractAttributes({
      components: { main: { battery: { battery: { value: 5, unit: "" } } } },
    });

    expect(attributes.get("main.battery.battery")).not.toHaveProperty("unit");
  });
});

describe("toAttributeValue", () => {
  it("should tag scalars", () => {
    expect(toAttributeValue(true)).toEqual({ kind: "boolean", value: true });
    expect(toAttributeValue(0)).toEqual({ kind: "number", value: 0 });
    expect(toAttributeValue("")).toEqual({ kind: "string", value: "" });
  });

  it("should treat non-finite numbers and undefined as absent", () => {
    expect(toAttributeValue(Number.NaN)).toEqual({ kind: "absent" });
    expect(toAttributeValue(undefined)).toEqual({ kind: "absent" });
  });

  it("should round-trip to JSON", () => {
    expect(attributeValueToJson(toAttributeValue([1, "a"]))).toEqual([1, "a"]);
    expect(attributeValueToJson({ kind: "absent" })).toBeNull();
  });
});
