import winston from 'winston';
import fs from 'fs';
import path from 'path';

const isTest = process.env.NODE_ENV === 'test';
const logsDir = path.resolve(process.cwd(), process.env.LOG_DIR || 'logs');

if (!isTest && !fs.existsSync(logsDir)) {
  fs.mkdirSync(logsDir, { recursive: true });
}

const logFormat = winston.format.combine(
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
  winston.format.errors({ stack: true }),
  winston.format.splat(),
  winston.format.json()
);

const consoleFormat = winston.format.combine(
  winston.format.colorize(),
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
  winston.format.printf(({ timestamp, level, message, ...meta }) => {
    let msg = `${timestamp} [${level}]: ${message}`;
    if (Object.keys(meta).length > 0) {
      msg += ` ${JSON.stringify(meta)}`;
    }
    return msg;
  })
);

const fileTransports = (files: { filename: string; level?: string; maxsize: number; maxFiles: number }[]) =>
  isTest ? [] : files.map((f) => new winston.transports.File({ ...f, filename: path.join(logsDir, f.filename) }));

export const logger = winston.createLogger({
  level: process.env.LOG_LEVEL || 'info',
  format: logFormat,
  defaultMeta: { service: 'reelsmith-pipeline' },
  transports: [
    new winston.transports.Console({ format: consoleFormat, silent: isTest }),
    ...fileTransports([
      { filename: 'error.log', level: 'error', maxsize: 5242880, maxFiles: 5 },
      { filename: 'combined.log', maxsize: 5242880, maxFiles: 5 },
    ]),
  ],
});

// Full LLM system instructions and payloads, untruncated, for prompt debugging
const promptFormat = winston.format.printf(({ timestamp, message, ...meta }) => {
  let output = `\n${'='.repeat(80)}\n`;
  output += `[${timestamp}] LLM PROMPT\n`;
  output += `${'='.repeat(80)}\n`;
  if (typeof meta.provider === 'string') output += `Provider: ${meta.provider}\n`;
  if (typeof meta.schemaName === 'string') output += `Schema: ${meta.schemaName}\n`;
  if (typeof meta.attempt === 'number') output += `Attempt: ${meta.attempt}\n`;
  output += `${'-'.repeat(80)}\n`;
  output += `${message}\n`;
  output += `${'='.repeat(80)}\n`;
  return output;
});

export const promptLogger = winston.createLogger({
  level: process.env.PROMPT_LOG_LEVEL || 'debug',
  format: winston.format.combine(winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }), promptFormat),
  silent: isTest,
  transports: fileTransports([{ filename: 'llm-prompts.log', maxsize: 10485760, maxFiles: 10 }]),
});
