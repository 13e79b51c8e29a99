// Minimal logger; diagnostics only, search results never go through here
import { ENV_VARS } from '../constants';

type LogLevel = 'debug' | 'warn';

type Primitive = string | number | boolean | undefined | null | bigint | symbol;
type SerializableObject = Record<string, unknown>;
type LogValue = Primitive | Error | SerializableObject | Array<Primitive | SerializableObject>;
type LogArg = LogValue;

const isEnabledValue = (value: string | undefined): boolean => {
  if (!value) return false;
  return !['0', 'false', 'off', 'no'].includes(value.toLowerCase());
};

let level: LogLevel = isEnabledValue(process.env[ENV_VARS.DEBUG]) ? 'debug' : 'warn';

export function setLogLevel(next: LogLevel): void {
  level = next;
}

// All output goes to stderr so stdout stays reserved for results
export const logger = {
  debug: (...args: LogArg[]): void => {
    if (level === 'debug') console.error('[debug]', ...args);
  },
  info: (...args: LogArg[]): void => {
    if (level === 'debug') console.error('[info]', ...args);
  },
  warn: (...args: LogArg[]): void => {
    console.warn('[warn]', ...args);
  },
  error: (...args: LogArg[]): void => {
    console.error('[error]', ...args);
  },
};
