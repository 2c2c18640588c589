import dotenv from 'dotenv';
import { Kafka, logLevel, Producer } from 'kafkajs';
import { loadConfig } from './config';
import { createWeatherStack } from './container';
import { logger } from './logger';
import { startWeatherConsumer } from './modules/weatherConsumer';

// -------------------------------------------------
// Env
// -------------------------------------------------
dotenv.config();

const config = loadConfig(process.env);
const stack = createWeatherStack(config);

// -------------------------------------------------
// Kafka setup
// -------------------------------------------------
const kafka = new Kafka({
  clientId: 'weather-service',
  brokers: config.kafka.brokers,
  logLevel: logLevel.NOTHING,
});

const producer: Producer = kafka.producer({ idempotent: true });
const consumer = kafka.consumer({ groupId: 'weather-group' });

let kafkaStarting = false;
let isShuttingDown = false;
let kafkaDownLogged = false;

producer.on(producer.events.CONNECT, () => {
  if (kafkaDownLogged) {
    logger.info('Kafka connection restored');
    kafkaDownLogged = false;
  } else {
    logger.info('Kafka producer connected');
  }
});

producer.on(producer.events.DISCONNECT, () => {
  logger.warn('Kafka producer disconnected');
});

// -------------------------------------------------
// Kafka init
// -------------------------------------------------
async function initKafkaSafely() {
  if (kafkaStarting) return;
  kafkaStarting = true;

  while (!isShuttingDown) {
    try {
      await producer.connect();
      await consumer.connect();

      await startWeatherConsumer(consumer, producer, stack.service);

      logger.info({ store: config.store.backend }, 'Weather consumer started');
      break;
    } catch (err) {
      if (!kafkaDownLogged) {
        kafkaDownLogged = true;
        logger.warn({ err }, 'Kafka unavailable, retrying every 10s');
      }
      await new Promise((res) => setTimeout(res, 10_000));
    }
  }
}

// Shutdown
async function shutdown(signal: string) {
  if (isShuttingDown) return;
  isShuttingDown = true;

  logger.info(`Received ${signal}. Shutting down...`);

  try {
    await consumer.disconnect();
    await producer.disconnect();
    await stack.close();

    process.exit(0);
  } catch (err) {
    logger.error({ err }, 'Shutdown error');
    process.exit(1);
  }
}

process.on('SIGINT', () => void shutdown('SIGINT'));
process.on('SIGTERM', () => void shutdown('SIGTERM'));

initKafkaSafely().catch((err) => {
  logger.fatal({ err }, 'Weather service failed to start');
  process.exit(1);
});
