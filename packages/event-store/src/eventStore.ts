import { promises as fs } from "fs";
import { dirname } from "path";
import { DomainEvent, EventFilter } from "../../shared/src";
export type { EventFilter } from "../../shared/src";

/** Append-only log of plan and audit events. */
export interface EventStore {
  append(event: DomainEvent): Promise<void>;
  query(filter?: EventFilter): Promise<DomainEvent[]>;
}

const matchesFilter = (event: DomainEvent, filter?: EventFilter): boolean => {
  if (!filter) return true;
  if (filter.types && filter.types.length > 0 && !filter.types.includes(event.type)) return false;
  if (filter.planId && event.meta.planId !== filter.planId) return false;
  return true;
};

const isDomainEvent = (value: unknown): value is DomainEvent =>
  typeof value === "object" &&
  value !== null &&
  "id" in value &&
  typeof value.id === "string" &&
  "aggregateId" in value &&
  typeof value.aggregateId === "string" &&
  "type" in value &&
  typeof value.type === "string" &&
  "timestamp" in value &&
  typeof value.timestamp === "string" &&
  "meta" in value &&
  typeof value.meta === "object" &&
  value.meta !== null;

const parseEventFile = (raw: string, filePath: string): DomainEvent[] => {
  const parsed: unknown = JSON.parse(raw);
  if (!Array.isArray(parsed)) {
    throw new Error(`event file ${filePath} does not contain an array`);
  }
  return parsed.filter(isDomainEvent);
};

const isMissingFile = (error: unknown): boolean =>
  error instanceof Error && "code" in error && error.code === "ENOENT";

export class InMemoryEventStore implements EventStore {
  private readonly events: DomainEvent[] = [];

  async append(event: DomainEvent): Promise<void> {
    this.events.push(event);
  }

  async query(filter?: EventFilter): Promise<DomainEvent[]> {
    return this.events.filter((evt) => matchesFilter(evt, filter));
  }
}

/**
 * Keeps the whole log in one JSON array on disk. Writes are chained so a
 * burst of appends never interleaves two rewrites of the file.
 */
export class JsonFileEventStore implements EventStore {
  private events: DomainEvent[] = [];
  private loaded = false;
  private queue: Promise<void> = Promise.resolve();

  constructor(private readonly filePath: string) {}

  private async ensureLoaded(): Promise<void> {
    if (this.loaded) return;
    try {
      this.events = parseEventFile(await fs.readFile(this.filePath, "utf-8"), this.filePath);
    } catch (error) {
      if (!isMissingFile(error)) throw error;
      this.events = [];
    }
    this.loaded = true;
  }

  async append(event: DomainEvent): Promise<void> {
    this.queue = this.queue.then(async () => {
      await this.ensureLoaded();
      this.events.push(event);
      await fs.mkdir(dirname(this.filePath), { recursive: true });
      await fs.writeFile(this.filePath, JSON.stringify(this.events, null, 2), "utf-8");
    });
    await this.queue;
  }

  async query(filter?: EventFilter): Promise<DomainEvent[]> {
    await this.queue;
    await this.ensureLoaded();
    return this.events.filter((evt) => matchesFilter(evt, filter));
  }
}
