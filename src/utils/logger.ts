import winston from 'winston';
import chalk from 'chalk';
import * as fs from 'node:fs';
import * as path from 'node:path';
import { CloudProvider } from '../types';
import { isCloudProvider } from './validators';

const PROVIDER_COLORS: Record<CloudProvider, (text: string) => string> = {
  [CloudProvider.AWS]: chalk.yellow,
  [CloudProvider.AZURE]: chalk.blue,
  [CloudProvider.GCP]: chalk.green,
  [CloudProvider.HETZNER]: chalk.red,
  [CloudProvider.CUSTOM]: chalk.magenta,
  [CloudProvider.LOCAL]: chalk.white,
};

function colorProvider(provider: unknown): string {
  if (isCloudProvider(provider)) return PROVIDER_COLORS[provider](`[${provider}]`);
  return typeof provider === 'string' && provider.length > 0 ? `[${provider}]` : '';
}

const customFormat = winston.format.printf(({ level, message, timestamp, provider }) => {
  const ts = chalk.gray(`[${timestamp}]`);
  const providerTag = colorProvider(provider);
  return providerTag
    ? `${ts} ${level} ${providerTag} ${message}`
    : `${ts} ${level} ${message}`;
});

const logger = winston.createLogger({
  level: process.env.CLOUDBRIDGE_LOG_LEVEL ?? 'info',
  format: winston.format.combine(
    winston.format.timestamp({ format: 'HH:mm:ss' }),
    winston.format.colorize(),
    customFormat,
  ),
  transports: [
    new winston.transports.Console({ stderrLevels: ['error', 'warn'] }),
  ],
});

export function addFileTransport(projectPath: string): void {
  const logDir = path.join(projectPath, '.cloudbridge', 'logs');
  if (!fs.existsSync(logDir)) {
    fs.mkdirSync(logDir, { recursive: true });
  }

  logger.add(
    new winston.transports.File({
      filename: path.join(logDir, 'cloudbridge-error.log'),
      level: 'error',
      maxsize: 5 * 1024 * 1024,
      maxFiles: 3,
      format: winston.format.combine(
        winston.format.timestamp(),
        winston.format.json(),
      ),
    }),
  );
  logger.add(
    new winston.transports.File({
      filename: path.join(logDir, 'cloudbridge-combined.log'),
      maxsize: 10 * 1024 * 1024,
      maxFiles: 5,
      format: winston.format.combine(
        winston.format.timestamp(),
        winston.format.json(),
      ),
    }),
  );
}

export function setLogLevel(level: string): void {
  logger.level = level;
}

export function providerLog(
  provider: CloudProvider,
  message: string,
  level: string = 'info',
): void {
  logger.log({ level, message, provider });
}

export default logger;
