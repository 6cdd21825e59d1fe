import { EventEmitter } from 'node:events';
import { stableStringify } from '../utils/json';

export type LogFormat = 'jsonl' | 'pretty';

export type LogEvent =
  | {
      event: 'request-sent';
      method: string;
      url: string;
      headers: Record<string, string>;
      bodyKind: 'none' | 'form' | 'raw';
      body?: string;
    }
  | {
      event: 'response-received';
      method: string;
      url: string;
      status: number;
      headers: Record<string, string>;
      body: string;
    }
  | {
      event: 'request-failed';
      method: string;
      url: string;
      message: string;
    }
  | {
      event: 'scenario-reset';
      scenario?: string;
    }
  | {
      event: 'step-failed';
      step: string;
      kind: string;
      message: string;
    };

export type EventLogger = {
  emitEvent: (event: LogEvent) => void;
  onEvent: (handler: (event: LogEvent) => void) => void;
};

export type EventLoggerOptions = {
  format?: LogFormat;
  stream?: NodeJS.WritableStream;
  color?: boolean;
};

const formatHeaders = (headers: Record<string, string>): string[] => {
  return Object.entries(headers)
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
    .map(([key, value]) => ` ○ ${key}: ${value}`);
};

const formatBody = (body?: string): string[] => {
  if (body === undefined || body.length === 0) {
    return [' ○ body=<empty>'];
  }
  return [' ○ body:', ...body.split('\n').map((line) => `   ${line}`)];
};

export const createEventLogger = ({ stream, format, color }: EventLoggerOptions = {}): EventLogger => {
  const emitter = new EventEmitter();
  const output = stream ?? process.stderr;
  const activeFormat = format ?? 'pretty';
  const useColor = color ?? (activeFormat === 'pretty' && !stream);

  const colors = {
    reset: '\u001b[0m',
    green: '\u001b[32m',
    red: '\u001b[31m',
    lightBlue: '\u001b[94m',
  };

  const colorizeLine = (line: string): string => {
    if (!useColor) {
      return line;
    }

    if (line.startsWith('✔')) {
      return `${colors.green}${line}${colors.reset}`;
    }

    if (line.startsWith('✖')) {
      return `${colors.red}${line}${colors.reset}`;
    }

    if (line.startsWith('▶')) {
      return `${colors.lightBlue}${line}${colors.reset}`;
    }

    return line;
  };

  const formatPretty = (event: LogEvent): string => {
    switch (event.event) {
      case 'request-sent':
        return [
          `▶ ${event.method} ${event.url}`,
          ...formatHeaders(event.headers),
          ...formatBody(event.body),
        ].map(colorizeLine).join('\n');
      case 'response-received':
        return [
          `${event.status < 400 ? '✔' : '✖'} ${event.status} ${event.method} ${event.url}`,
          ...formatHeaders(event.headers),
          ...formatBody(event.body),
        ].map(colorizeLine).join('\n');
      case 'request-failed':
        return [
          `✖ ${event.method} ${event.url}`,
          ` ○ message=${event.message}`,
        ].map(colorizeLine).join('\n');
      case 'scenario-reset':
        return [`▶ Scenario reset ${event.scenario ?? ''}`.trimEnd()].map(colorizeLine).join('\n');
      case 'step-failed':
        return [
          `✖ Step failed: ${event.step}`,
          ` ○ kind=${event.kind}`,
          ` ○ message=${event.message}`,
        ].map(colorizeLine).join('\n');
      default: {
        const exhaustive: never = event;
        return stableStringify(exhaustive);
      }
    }
  };

  const emitEvent = (event: LogEvent) => {
    emitter.emit('event', event);
    const line = activeFormat === 'jsonl' ? stableStringify(event) : formatPretty(event);
    output.write(`${line}\n`);
  };

  const onEvent = (handler: (event: LogEvent) => void) => {
    emitter.on('event', handler);
  };

  return { emitEvent, onEvent };
};

export const createNullEventLogger = (): EventLogger => {
  return {
    emitEvent: () => undefined,
    onEvent: () => undefined,
  };
};
