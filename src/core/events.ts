import { nanoid } from 'nanoid';
import type { Logger } from 'pino';
import { z } from 'zod';
import type { GantryDb } from '../infra/db.js';
import { parseRecord } from './json.js';
import { EVENT_TYPES } from './types.js';
import type { BusEvent, EventId, EventPayloads, EventType, StoredEvent } from './types.js';

export type EventHandler<K extends EventType> = (event: BusEvent<K>) => void | Promise<void>;

type HandlerTable = { [K in EventType]?: Array<EventHandler<K>> };

export const EventTypeSchema = z.enum(EVENT_TYPES);

interface EventRow {
  seq: number;
  id: string;
  type: string;
  actor: string;
  payload_json: string;
  created_at: number;
}

export interface EventQuery {
  type?: EventType;
  actor?: string;
  limit?: number;
}

function rowToEvent(r: EventRow): StoredEvent {
  return {
    seq: r.seq,
    id: r.id,
    type: EventTypeSchema.parse(r.type),
    actor: r.actor,
    payload: parseRecord(r.payload_json),
    createdAt: r.created_at
  };
}

/**
 * Append-only event log with in-process fan-out.
 *
 * `publish` writes the row before any handler runs, so a handler querying the
 * log always finds the event it was called with. Handlers run one after the
 * other in registration order; a failing handler is logged and the rest still
 * run. Handlers are a live notification only: after a crash between the insert
 * and delivery the log is the source of truth.
 */
export class EventLog {
  private handlers: HandlerTable = {};

  constructor(private db: GantryDb, private log: Logger) {}

  async publish<K extends EventType>(type: K, actor: string, payload: EventPayloads[K]): Promise<EventId> {
    const event: BusEvent<K> = { id: nanoid(16), type, actor, payload, createdAt: Date.now() };

    this.db
      .prepare('INSERT INTO events (id, type, actor, payload_json, created_at) VALUES (?, ?, ?, ?, ?)')
      .run(event.id, event.type, event.actor, JSON.stringify(event.payload), event.createdAt);
    this.log.debug({ eventId: event.id, type, actor }, 'event.published');

    // Snapshot so an unsubscribe during delivery does not skip a neighbour.
    const handlers = [...(this.handlers[type] ?? [])];
    for (const [index, handler] of handlers.entries()) {
      try {
        await handler(event);
      } catch (err) {
        this.log.error({ err, eventId: event.id, type, handler: index }, 'event.handler_failed');
      }
    }
    return event.id;
  }

  subscribe<K extends EventType>(type: K, handler: EventHandler<K>): () => void {
    const list: Array<EventHandler<K>> = this.handlers[type] ?? [];
    list.push(handler);
    this.handlers[type] = list;
    return () => {
      const i = list.indexOf(handler);
      if (i !== -1) list.splice(i, 1);
    };
  }

  listenerCount(type: EventType): number {
    return this.handlers[type]?.length ?? 0;
  }

  query(filter: EventQuery = {}): StoredEvent[] {
    const conditions: string[] = [];
    const params: Array<string | number> = [];

    if (filter.type) {
      conditions.push('type = ?');
      params.push(filter.type);
    }
    if (filter.actor) {
      conditions.push('actor = ?');
      params.push(filter.actor);
    }

    let sql = 'SELECT seq, id, type, actor, payload_json, created_at FROM events';
    if (conditions.length > 0) sql += ` WHERE ${conditions.join(' AND ')}`;
    sql += ' ORDER BY seq DESC';
    if (filter.limit) {
      sql += ' LIMIT ?';
      params.push(filter.limit);
    }

    const rows = this.db.prepare(sql).all(...params) as EventRow[];
    return rows.map(rowToEvent);
  }

  get(id: EventId): StoredEvent | null {
    const row = this.db
      .prepare('SELECT seq, id, type, actor, payload_json, created_at FROM events WHERE id = ?')
      .get(id) as EventRow | undefined;
    return row ? rowToEvent(row) : null;
  }
}
