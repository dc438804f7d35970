import winston from 'winston';

const isTest = process.env.NODE_ENV === 'test';

const consoleFormat = winston.format.combine(
  winston.format.timestamp(),
  winston.format.splat(),
  winston.format.printf((info: winston.Logform.TransformableInfo) => {
    const { timestamp, level, message, ...meta } = info;
    const extra = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : '';
    return `${String(timestamp)} [${level}] ${String(message)}${extra}`;
  })
);

export const logger = winston.createLogger({
  level: process.env.LOG_LEVEL || 'info',
  silent: isTest,
  transports: [new winston.transports.Console({ format: consoleFormat })]
});
