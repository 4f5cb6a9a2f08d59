import type { DeviceApi } from "./api.js";
import { HomeAssistantDiscovery } from "./devices/homeassistant.js";
import { StatePublisher } from "./devices/state.js";
import { StateStore } from "./devices/store.js";
import type { Logger } from "./logger.js";
import type { MqttConnection } from "./publish.js";
import { TopicRouter } from "./router.js";
import { OFFLINE, ONLINE, type Topics } from "./topics.js";
import { sleep } from "./utils.js";

export interface BridgeOptions {
  api: DeviceApi;
  connection: MqttConnection;
  topics: Topics;
  logger: Logger;
  /** Seconds between the start of two poll cycles. */
  pollInterval: number;
  publishDiscovery: boolean;
  publishChunkSize?: number;
  store?: StateStore;
  clock?: () => number;
}

/**
 * Wires the engine together and owns the poll loop.
 */
export class Bridge {
  readonly store: StateStore;

  readonly statePublisher: StatePublisher;

  readonly router: TopicRouter;

  private abort: AbortController | undefined;

  private loop: Promise<void> | undefined;

  constructor(private readonly options: BridgeOptions) {
    const { api, connection, topics, logger } = options;
    this.store = options.store ?? new StateStore();
    const discovery = options.publishDiscovery
      ? new HomeAssistantDiscovery({ publisher: connection, store: this.store, topics, logger })
      : undefined;
    this.statePublisher = new StatePublisher({
      api,
      publisher: connection,
      store: this.store,
      topics,
      logger,
      discovery,
      publishChunkSize: options.publishChunkSize,
      clock: options.clock,
    });
    this.router = new TopicRouter({
      api,
      statePublisher: this.statePublisher,
      topics,
      logger,
    });
  }

  /**
   * List devices and upsert them into the device cache. Returns their ids in listing order.
   */
  async refreshDevices(): Promise<string[]> {
    const devices = await this.options.api.listDevices();
    for (const device of devices) {
      this.store.upsertDevice(device);
    }
    return devices.map((device) => device.deviceId);
  }

  async pollOnce(): Promise<void> {
    const { logger } = this.options;
    let deviceIds: string[];
    try {
      deviceIds = await this.refreshDevices();
    } catch (err) {
      logger.error("Device listing failed:", err);
      return;
    }
    logger.log(`Refreshing ${deviceIds.length} devices`);
    for (const deviceId of deviceIds) {
      await this.statePublisher.publishDeviceState(deviceId);
    }
  }

  /**
   * Announce the bridge, subscribe to command topics and start polling.
   */
  async start(): Promise<void> {
    const { connection, topics } = this.options;
    await connection.publish(topics.bridgeStatus(), ONLINE, { retain: true });
    await connection.subscribe(topics.commandSubscriptions(), (topic, payload) => {
      void this.router.dispatch(topic, payload);
    });
    const abort = new AbortController();
    this.abort = abort;
    this.loop = this.run(abort.signal);
  }

  private async run(signal: AbortSignal): Promise<void> {
    const { logger, pollInterval } = this.options;
    while (!signal.aborted) {
      const start = Date.now();
      try {
        await this.pollOnce();
      } catch (err) {
        logger.error("Unexpected polling failure:", err);
      }
      const sleepInterval = Math.max(0, pollInterval * 1000 - (Date.now() - start));
      logger.log(`Sleeping for ${sleepInterval}ms...`);
      await sleep(sleepInterval, signal);
    }
  }

  /**
   * Finish the current cycle, mark the bridge offline and close the connection.
   */
  async stop(): Promise<void> {
    const { connection, topics, logger } = this.options;
    this.abort?.abort();
    await this.loop;
    this.abort = undefined;
    this.loop = undefined;
    await connection.publish(topics.bridgeStatus(), OFFLINE, { retain: true });
    await connection.end();
    logger.log("Bridge stopped");
  }
}
