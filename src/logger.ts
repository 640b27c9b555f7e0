import chalk from 'chalk';
import { randomUUID } from 'node:crypto';
import type { LogEntry, LogType } from './types.js';
import { isTruthyEnv } from './utils.js';

const TYPE_COLORS: Record<LogType, (text: string) => string> = {
  SYSTEM: chalk.gray,
  ADD: chalk.green,
  REMOVE: chalk.yellow,
  CLEAR: chalk.yellowBright,
  EVICT: chalk.red,
  INVOKE: chalk.blue,
};

export class DelegateLogger {
  private consoleOutputEnabled = isTruthyEnv('DELEGATE_TRACE');
  private consoleTypes: ReadonlySet<LogType> | undefined;
  private subscribers: Set<(entry: LogEntry) => void> = new Set();

  /** False when nobody would see an entry; callers skip building one. */
  get enabled(): boolean {
    return this.consoleOutputEnabled || this.subscribers.size > 0;
  }

  setConsoleOutputEnabled(enabled: boolean) {
    this.consoleOutputEnabled = enabled;
  }

  /** Restrict console output to these types; `undefined` prints everything. */
  setConsoleTypes(types: readonly LogType[] | undefined) {
    this.consoleTypes = types ? new Set(types) : undefined;
  }

  subscribe(cb: (entry: LogEntry) => void): () => void {
    this.subscribers.add(cb);
    return () => {
      this.subscribers.delete(cb);
    };
  }

  log(entry: Omit<LogEntry, 'id' | 'timestamp'>): LogEntry {
    const fullEntry: LogEntry = {
      id: randomUUID(),
      timestamp: new Date().toISOString(),
      ...entry,
    };

    for (const sub of this.subscribers) {
      try {
        sub(fullEntry);
      } catch {
        // Log sinks must not break the delegate that is logging.
      }
    }

    if (this.consoleOutputEnabled && (!this.consoleTypes || this.consoleTypes.has(fullEntry.type))) {
      console.log(formatEntry(fullEntry));
    }
    return fullEntry;
  }
}

export function formatEntry(entry: LogEntry): string {
  const timeStr = entry.timestamp.split('T')[1]?.split('.')[0] ?? entry.timestamp;
  const prefix = chalk.gray(`[${timeStr}]`);
  const typeStr = TYPE_COLORS[entry.type](`[${entry.type}]`);
  const delegateInfo = entry.delegate ? ` <${chalk.hex('#FFA500')(entry.delegate)}>` : '';
  return `${prefix} ${typeStr}${delegateInfo}: ${entry.content}`;
}

export const logger = new DelegateLogger();
