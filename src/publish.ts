import asyncMqtt, { type AsyncMqttClient } from "async-mqtt";
import type { Logger } from "./logger.js";

const { connectAsync } = asyncMqtt;

export interface PublishOptions {
  retain?: boolean;
}

/**
 * The part of the MQTT connection the bridge engine publishes through.
 */
export interface MessagePublisher {
  publish(topic: string, payload: string, options?: PublishOptions): Promise<void>;
  publishJson(topic: string, message: unknown, options?: PublishOptions): Promise<void>;
}

export type MessageHandler = (topic: string, payload: string) => void;

/**
 * Full connection surface used by the bridge lifecycle.
 */
export interface MqttConnection extends MessagePublisher {
  subscribe(topics: string[], handler: MessageHandler): Promise<void>;
  end(): Promise<void>;
}

export interface StatusMessage {
  topic: string;
  payload: string;
}

export interface PublisherOptions {
  url: string;
  clientId?: string;
  username?: string;
  password?: string;
  /** Last will, sent by the broker when the connection is lost. */
  will?: StatusMessage;
  /** Published retained after every automatic reconnect, superseding the will. */
  reconnectMessage?: StatusMessage;
  logger?: Logger;
}

export class Publisher implements MqttConnection {
  private client: Promise<AsyncMqttClient> | undefined;

  private readonly logger: Logger;

  constructor(private readonly options: PublisherOptions) {
    this.logger = options.logger ?? console;
  }

  private getClient(): Promise<AsyncMqttClient> {
    if (this.client == null) {
      this.client = this.open().catch((err: unknown) => {
        // Let the next call try again
        this.client = undefined;
        throw err;
      });
    }
    return this.client;
  }

  private async open(): Promise<AsyncMqttClient> {
    const { url, clientId, username, password, will, reconnectMessage } = this.options;
    const client = await connectAsync(url, {
      clientId,
      username,
      password,
      keepalive: 60,
      will: will && { ...will, qos: 0, retain: true },
    });
    this.logger.log(`Connected to MQTT broker at ${url}`);
    if (reconnectMessage) {
      // Fires for reconnects only, the initial connect has already happened
      client.on("connect", () => {
        this.logger.log("Reconnected to MQTT broker");
        const { topic, payload } = reconnectMessage;
        client.publish(topic, payload, { retain: true }).catch((err: unknown) => {
          this.logger.error(`Failed to publish ${topic}`, err);
        });
      });
    }
    return client;
  }

  async connect(): Promise<void> {
    await this.getClient();
  }

  async publish(topic: string, payload: string, options?: PublishOptions): Promise<void> {
    await (await this.getClient()).publish(topic, payload, { retain: options?.retain ?? false });
  }

  async publishJson(topic: string, message: unknown, options?: PublishOptions): Promise<void> {
    await this.publish(topic, JSON.stringify(message), options);
  }

  /**
   * Subscribe to `topics` and deliver every inbound message as UTF-8 text.
   */
  async subscribe(topics: string[], handler: MessageHandler): Promise<void> {
    const client = await this.getClient();
    client.on("message", (topic: string, payload: Buffer) => {
      handler(topic, payload.toString("utf-8"));
    });
    await client.subscribe(topics);
    this.logger.log(`Subscribed to command topics: ${topics.join(", ")}`);
  }

  async end(): Promise<void> {
    if (this.client) {
      const client = await this.client;
      this.client = undefined;
      await client.end();
    }
  }
}
