import pino from "pino";

const env = process.env.NODE_ENV;

const defaultLevel =
    env === "test" ? "silent" : env === "development" ? "debug" : "info";

export const logger = pino({
    name: "weather-service",
    level: process.env.LOG_LEVEL ?? defaultLevel,
    timestamp: pino.stdTimeFunctions.isoTime,
    base: { pid: process.pid },
    transport: env === "development"
        ? {
            target: "pino-pretty",
            options: {
                colorize: true,
                translateTime: "yyyy-mm-dd HH:MM:ss",
                ignore: "pid,hostname",
            },
        }
        : undefined,
});
