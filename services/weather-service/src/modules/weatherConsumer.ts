import { Consumer, KafkaMessage, Producer } from 'kafkajs';
import { z } from 'zod';

import { InvalidInputError, toWeatherError } from '../errors';
import {
  CurrentCommandSchema,
  ForecastCommandSchema,
  OverrideCommandSchema,
} from '../interfaces/commands';
import { CurrentWeather, ForecastRange } from '../interfaces/weather';
import { WeatherCommand, WeatherResult } from '../interfaces/weatherResult';
import { logger } from '../logger';
import { WeatherService } from './weather';

export const COMMAND_TOPICS: Record<WeatherCommand, string> = {
  current: 'weather.service.command.current',
  forecast: 'weather.service.command.forecast',
  override: 'weather.service.command.override',
};

export const RESULT_TOPIC = 'weather.service.event.result';

export type WeatherResolver = Pick<
  WeatherService,
  'getCurrentWeather' | 'getForecast' | 'setOverride'
>;

const RequestIdSchema = z.object({ requestId: z.string() });

const COMMANDS: WeatherCommand[] = ['current', 'forecast', 'override'];

function commandForTopic(topic: string): WeatherCommand | undefined {
  return COMMANDS.find(
    (command) => COMMAND_TOPICS[command] === topic
  );
}

function parseCommand<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  payload: unknown
): T {
  const parsed = schema.safeParse(payload);
  if (!parsed.success) {
    const reason = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new InvalidInputError('payload', `Invalid command payload (${reason})`);
  }
  return parsed.data;
}

function decode(raw: string | undefined): unknown {
  if (!raw) {
    throw new InvalidInputError('payload', 'Empty command message');
  }
  try {
    return JSON.parse(raw);
  } catch {
    throw new InvalidInputError('payload', 'Command message is not valid JSON');
  }
}

async function dispatch(
  service: WeatherResolver,
  command: WeatherCommand,
  payload: unknown
): Promise<CurrentWeather | ForecastRange> {
  switch (command) {
    case 'current': {
      const { data } = parseCommand(CurrentCommandSchema, payload);
      return service.getCurrentWeather(data.city);
    }
    case 'forecast': {
      const { data } = parseCommand(ForecastCommandSchema, payload);
      return service.getForecast(data.city, data.date);
    }
    case 'override': {
      const { data } = parseCommand(OverrideCommandSchema, payload);
      return service.setOverride(data.city, data.date, {
        minTemperature: data.minTemperature,
        maxTemperature: data.maxTemperature,
      });
    }
  }
}

/**
 * Runs one command against the service and shapes the outcome as a result
 * event. Never throws: every failure becomes an error result.
 */
export async function handleCommand(
  service: WeatherResolver,
  command: WeatherCommand,
  raw: string | undefined
): Promise<WeatherResult> {
  const timestamp = Date.now();
  let requestId: string | null = null;

  try {
    const payload = decode(raw);

    const id = RequestIdSchema.safeParse(payload);
    if (id.success) requestId = id.data.requestId;

    const data = await dispatch(service, command, payload);
    return { status: 'success', requestId, command, data, timestamp };
  } catch (err) {
    const error = toWeatherError(err);

    logger.warn(
      { command, requestId, kind: error.kind, detail: error.detail },
      error.message
    );

    return {
      status: 'error',
      requestId,
      command,
      error: { kind: error.kind, message: error.message, detail: error.detail },
      timestamp,
    };
  }
}

export interface IncomingMessage {
  topic: string;
  message: Pick<KafkaMessage, 'key' | 'value'>;
}

export function createCommandHandler(
  service: WeatherResolver,
  producer: Pick<Producer, 'send'>
) {
  return async ({ topic, message }: IncomingMessage): Promise<void> => {
    const command = commandForTopic(topic);
    if (!command) {
      logger.warn({ topic }, 'Message on unknown topic ignored');
      return;
    }

    const result = await handleCommand(service, command, message.value?.toString());

    try {
      await producer.send({
        topic: RESULT_TOPIC,
        messages: [{ key: message.key, value: JSON.stringify(result) }],
      });
    } catch (err) {
      // Rethrown so kafkajs redelivers the command
      logger.error({ err, topic, requestId: result.requestId }, 'Weather result publish failed');
      throw err;
    }

    logger.info(
      { command, requestId: result.requestId, status: result.status },
      'Weather result published'
    );
  };
}

export async function startWeatherConsumer(
  consumer: Pick<Consumer, 'subscribe' | 'run'>,
  producer: Pick<Producer, 'send'>,
  service: WeatherResolver
) {
  await consumer.subscribe({
    topics: Object.values(COMMAND_TOPICS),
    fromBeginning: false,
  });

  await consumer.run({
    eachMessage: createCommandHandler(service, producer),
  });
}
