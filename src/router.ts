import type { DeviceApi } from "./api.js";
import { parseCapabilityCommand, parseDeviceCommand } from "./commands.js";
import type { StatePublisher } from "./devices/state.js";
import type { Logger } from "./logger.js";
import type { Topics } from "./topics.js";

export interface TopicRouterOptions {
  api: Pick<DeviceApi, "sendCommands">;
  statePublisher: Pick<StatePublisher, "publishDeviceState">;
  topics: Topics;
  logger: Logger;
}

/**
 * Routes inbound command topics to the matching translator, submits the
 * command and refreshes the device state right after.
 */
export class TopicRouter {
  private queue: Promise<void> = Promise.resolve();

  constructor(private readonly options: TopicRouterOptions) {}

  /**
   * Queue a message behind the ones already received. Resolves once it is handled.
   */
  dispatch(topic: string, payload: string): Promise<void> {
    const next = this.queue.then(() => this.handleMessage(topic, payload)).catch((err: unknown) => {
      this.options.logger.error(`Unexpected error handling ${topic}:`, err);
    });
    this.queue = next;
    return next;
  }

  async handleMessage(topic: string, payload: string): Promise<void> {
    const { api, statePublisher, topics, logger } = this.options;
    const parsed = topics.parse(topic);
    if (!parsed) {
      return;
    }

    const envelope =
      parsed.kind === "capability"
        ? parseCapabilityCommand(payload, parsed.component, parsed.capability)
        : parseDeviceCommand(payload);
    if (!envelope) {
      logger.warn(`Ignoring empty or invalid command on ${topic}`);
      return;
    }

    try {
      await api.sendCommands(parsed.deviceId, envelope);
    } catch (err) {
      logger.error(`Command failed for ${parsed.deviceId}:`, err);
      return;
    }
    logger.log(`Command sent to device ${parsed.deviceId}: ${JSON.stringify(envelope)}`);
    // Shorten the window in which the hub shows stale state
    await statePublisher.publishDeviceState(parsed.deviceId, true);
  }
}
