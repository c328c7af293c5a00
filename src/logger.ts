import pino from 'pino';
import { getConfig } from './config.js';

const cfg = getConfig();

// stdout carries the MCP stdio transport
export const logger = pino(
  {
    level: cfg.logLevel,
    base: undefined,
    redact: ['params.apiKey', 'params.api_key', 'config.params.apiKey', 'config.params.api_key'],
  },
  pino.destination(2),
);
