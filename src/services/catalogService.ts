import { eq } from 'drizzle-orm';
import type { DbType } from '../db';
import { events, tickets, type Event, type Ticket } from '../db/schema';

export interface TicketCatalog {
  getTicket(ticketId: string): Promise<Ticket | null>;
}

export interface EventCatalog {
  getEvent(eventId: string): Promise<Event | null>;
}

/**
 * Read-only access to the catalog tables. Ticket and event CRUD live elsewhere.
 */
export class DrizzleCatalog implements TicketCatalog, EventCatalog {
  constructor(private readonly db: DbType) {}

  async getTicket(ticketId: string): Promise<Ticket | null> {
    const [ticket] = await this.db.select().from(tickets).where(eq(tickets.id, ticketId)).limit(1);
    return ticket ?? null;
  }

  async getEvent(eventId: string): Promise<Event | null> {
    const [event] = await this.db.select().from(events).where(eq(events.id, eventId)).limit(1);
    return event ?? null;
  }
}
