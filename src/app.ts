import { SmartThingsApi } from "./api.js";
import { Bridge } from "./bridge.js";
import { anonymizeConfig, getConfig, mqttUrl } from "./config.js";
import { consoleLogger } from "./logger.js";
import { Publisher } from "./publish.js";
import { OFFLINE, ONLINE, Topics } from "./topics.js";

async function run(): Promise<void> {
  // Throws on a missing token, before anything touches the network
  const config = getConfig();
  const logger = consoleLogger(config.verbose);
  logger.log(JSON.stringify(anonymizeConfig(config)));

  const topics = new Topics(config.mqttTopic, config.discoveryPrefix);
  const api = new SmartThingsApi({
    token: config.token,
    baseUrl: config.apiBase,
    timeout: config.httpTimeout * 1000,
    logger,
  });
  const connection = new Publisher({
    url: mqttUrl(config),
    clientId: config.mqttClientId,
    username: config.mqttUsername,
    password: config.mqttPassword,
    will: { topic: topics.bridgeStatus(), payload: OFFLINE },
    reconnectMessage: { topic: topics.bridgeStatus(), payload: ONLINE },
    logger,
  });
  const bridge = new Bridge({
    api,
    connection,
    topics,
    logger,
    pollInterval: config.pollInterval,
    publishDiscovery: config.publishDiscovery,
    publishChunkSize: config.publishChunkSize,
  });

  logger.log("Validating SmartThings API access...");
  try {
    const deviceIds = await bridge.refreshDevices();
    logger.log(`Found ${deviceIds.length} SmartThings devices`);
  } catch (err) {
    logger.error("SmartThings API access failed, continuing with polling:", err);
  }

  await connection.connect();
  await bridge.start();

  const shutdown = (signal: string) => {
    logger.log(`Received ${signal}, shutting down...`);
    bridge.stop().then(
      () => process.exit(0),
      (err: unknown) => {
        logger.error("Shutdown failed:", err);
        process.exit(1);
      },
    );
  };
  process.once("SIGINT", shutdown);
  process.once("SIGTERM", shutdown);
}

run().catch((err: unknown) => {
  consoleLogger(false).error(err);
  process.exit(1);
});
