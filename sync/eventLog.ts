import fs from 'fs';
import path from 'path';

export type EventValue = string | number | boolean | undefined;

export interface SyncEvent {
  time: number;
  message: string;
  [field: string]: EventValue;
}

export interface EventLogOptions {
  verbose?: boolean;
  now?: () => number;
}

/**
 * Collects what happened during a sync so it can be written out as a CSV
 * next to the exported files.
 */
export class EventLog {
  readonly events: SyncEvent[] = [];
  private readonly verbose: boolean;
  private readonly now: () => number;
  private readonly startTime: number;

  constructor(options: EventLogOptions = {}) {
    this.verbose = options.verbose ?? false;
    this.now = options.now ?? Date.now;
    this.startTime = this.now();
  }

  record(message: string, fields: Record<string, EventValue> = {}): SyncEvent {
    const event: SyncEvent = { time: (this.now() - this.startTime) / 1000, message };
    for (const [key, value] of Object.entries(fields)) {
      if (key !== 'time' && key !== 'message') event[key] = value;
    }
    this.events.push(event);
    if (this.verbose) {
      console.log(event);
    }
    return event;
  }

  toCsv(): string {
    const labels: string[] = [];
    for (const event of this.events) {
      for (const key of Object.keys(event)) {
        if (!labels.includes(key)) labels.push(key);
      }
    }

    const headerRow = labels.map(escapeCsvValue).join(',');
    const dataRows = this.events.map(event => labels.map(label => escapeCsvValue(event[label])).join(','));
    return [headerRow, ...dataRows].join('\n');
  }

  writeCsv(csvPath: string): void {
    fs.mkdirSync(path.dirname(csvPath), { recursive: true });
    fs.writeFileSync(csvPath, this.toCsv(), 'utf-8');
  }
}

function escapeCsvValue(value: EventValue): string {
  const stringValue = value != null ? String(value) : '';

  if (stringValue.includes(',') || stringValue.includes('"') || stringValue.includes('\n')) {
    return `"${stringValue.replace(/"/g, '""')}"`;
  }
  return stringValue;
}
