import { beforeEach, describe, expect, it, vi } from "vitest";
import fetch, { Response } from "node-fetch";
import { ApiError, SmartThingsApi } from "../api.js";
import { nullLogger } from "../logger.js";

vi.mock("node-fetch", async (importOriginal) => {
  const actual = await importOriginal<typeof import("node-fetch")>();
  return { ...actual, default: vi.fn() };
});

const fetchMock = vi.mocked(fetch);

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "content-type": "application/json" },
  });
}

describe("SmartThingsApi", () => {
  let api: SmartThingsApi;

  beforeEach(() => {
    fetchMock.mockReset();
    api = new SmartThingsApi({
      token: "test-token",
      baseUrl: "https://api.test/v1/",
      timeout: 1000,
      logger: nullLogger,
    });
  });

  it("should authenticate with the bearer token", async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse({ items: [] }));

    await api.listDevices();

    expect(fetchMock).toHaveBeenCalledWith(
      "https://api.test/v1/devices",
      expect.objectContaining({
        method: "get",
        headers: { authorization: "Bearer test-token", "content-type": "application/json" },
      }),
    );
  });

  it("should follow device list pages", async () => {
    fetchMock
      .mockResolvedValueOnce(
        jsonResponse({
          items: [{ deviceId: "a", label: "Lamp" }, { label: "No id" }],
          _links: { next: { href: "https://api.test/v1/devices?page=1" } },
        }),
      )
      .mockResolvedValueOnce(jsonResponse({ items: [{ deviceId: "b" }], _links: { next: null } }));

    const devices = await api.listDevices();

    expect(devices).toEqual([{ deviceId: "a", label: "Lamp" }, { deviceId: "b" }]);
    expect(fetchMock.mock.calls.map(([url]) => url)).toEqual([
      "https://api.test/v1/devices",
      "https://api.test/v1/devices?page=1",
    ]);
  });

  it("should encode the device id in the status path", async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse({ components: {} }));

    const status = await api.getDeviceStatus("a b");

    expect(status).toEqual({ components: {} });
    expect(fetchMock.mock.calls[0][0]).toBe("https://api.test/v1/devices/a%20b/status");
  });

  it("should raise ApiError with the response body", async () => {
    fetchMock.mockResolvedValueOnce(new Response("Unauthorized", { status: 401 }));

    const error = await api.getDeviceStatus("dev1").catch((err: unknown) => err);

    expect(error).toBeInstanceOf(ApiError);
    expect(error).toMatchObject({
      status: 401,
      body: "Unauthorized",
      message: "GET https://api.test/v1/devices/dev1/status failed with status 401: Unauthorized",
    });
  });

  it("should post commands as JSON", async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse({ results: [{ id: "1", status: "ACCEPTED" }] }));
    const envelope = { commands: [{ component: "main", capability: "switch", command: "on" }] };

    const result = await api.sendCommands("dev1", envelope);

    expect(result).toEqual({ results: [{ id: "1", status: "ACCEPTED" }] });
    expect(fetchMock).toHaveBeenCalledWith(
      "https://api.test/v1/devices/dev1/commands",
      expect.objectContaining({ method: "post", body: JSON.stringify(envelope) }),
    );
  });

  it("should accept an empty command response", async () => {
    fetchMock.mockResolvedValueOnce(new Response("", { status: 200 }));

    await expect(
      api.sendCommands("dev1", { commands: [{ component: "main", capability: "switch", command: "off" }] }),
    ).resolves.toEqual({});
  });

  it("should normalize a base URL without a trailing slash", async () => {
    const plain = new SmartThingsApi({ token: "test-token", baseUrl: "https://api.test/v1", logger: nullLogger });
    fetchMock.mockResolvedValueOnce(jsonResponse({ components: {} }));

    await plain.getDeviceStatus("dev1");

    expect(fetchMock.mock.calls[0][0]).toBe("https://api.test/v1/devices/dev1/status");
  });
});
