import chalk from 'chalk';
import { sanitizeError } from './redaction.js';
import type { LOG_LEVELS } from '../constants/config.js';

export type LogLevel = (typeof LOG_LEVELS)[number];

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

let currentLevel: LogLevel = 'info';

export const setLogLevel = (level: LogLevel): void => {
  currentLevel = level;
};

export const getLogLevel = (): LogLevel => currentLevel;

const enabled = (level: LogLevel): boolean => LEVEL_RANK[level] >= LEVEL_RANK[currentLevel];

// Every line goes through sanitizeError so a bearer token or key in a
// message never reaches the terminal.
const render = (message: string, detail?: unknown): string =>
  detail === undefined ? sanitizeError(message) : `${sanitizeError(message)} ${sanitizeError(detail)}`;

export const logger = {
  debug: (message: string, detail?: unknown): void => {
    if (enabled('debug')) console.log(chalk.gray(render(message, detail)));
  },
  info: (message: string, detail?: unknown): void => {
    if (enabled('info')) console.log(chalk.blue(render(message, detail)));
  },
  success: (message: string, detail?: unknown): void => {
    if (enabled('info')) console.log(chalk.green(render(message, detail)));
  },
  warn: (message: string, detail?: unknown): void => {
    if (enabled('warn')) console.warn(chalk.yellow(render(message, detail)));
  },
  error: (message: string, detail?: unknown): void => {
    if (enabled('error')) console.error(chalk.red(render(message, detail)));
  },
};
