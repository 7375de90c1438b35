import { NotFoundError } from "../../errors";
import {
  EventStore,
  NewEventInput,
  PlannedEvent,
  RsvpRecord,
  RsvpStatus,
  emptyCounts,
} from "../../services/eventStore";

/**
 * In-process EventStore for tests: same uniqueness and cascade rules as the Mongo store.
 * `now` is injectable so ordering by time is deterministic.
 */
export function createMemoryEventStore(now: () => Date = () => new Date()) {
  let nextId = 1;
  const events = new Map<number, PlannedEvent>();
  const rsvps = new Map<string, RsvpRecord>();

  const key = (eventId: number, responderId: number) => `${eventId}:${responderId}`;

  function rsvpsOf(eventId: number) {
    return [...rsvps.values()].filter((r) => r.eventId === eventId);
  }

  function write(eventId: number, responderId: number, status: RsvpStatus, onlyIfAbsent: boolean) {
    if (!events.has(eventId)) throw new NotFoundError(`Event ${eventId} not found`);
    const existing = rsvps.get(key(eventId, responderId));
    if (existing && onlyIfAbsent) return { ...existing };
    const row: RsvpRecord = { eventId, responderId, status, updatedAt: now() };
    rsvps.set(key(eventId, responderId), row);
    return { ...row };
  }

  const store: EventStore = {
    async createEvent(organizerId: number, input: NewEventInput) {
      const event: PlannedEvent = { id: nextId++, organizerId, ...input, createdAt: now() };
      events.set(event.id, event);
      return { ...event };
    },
    async getEvent(eventId) {
      const event = events.get(eventId);
      return event ? { ...event } : null;
    },
    async deleteEvent(eventId, requesterId) {
      const event = events.get(eventId);
      if (!event || event.organizerId !== requesterId) return false;
      events.delete(eventId);
      for (const r of rsvpsOf(eventId)) rsvps.delete(key(r.eventId, r.responderId));
      return true;
    },
    async listEventsByUser(organizerId) {
      return [...events.values()]
        .filter((e) => e.organizerId === organizerId)
        .sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime() || b.id - a.id)
        .map((e) => ({ ...e }));
    },
    async upsertRsvp(eventId, responderId, status) {
      return write(eventId, responderId, status, false);
    },
    async joinEvent(eventId, responderId, defaultStatus) {
      return write(eventId, responderId, defaultStatus, true);
    },
    async getRsvp(eventId, responderId) {
      const row = rsvps.get(key(eventId, responderId));
      return row ? { ...row } : null;
    },
    async rsvpCounts(eventId) {
      const counts = emptyCounts();
      for (const r of rsvpsOf(eventId)) counts[r.status] += 1;
      return counts;
    },
  };

  return { store, rowCount: () => rsvps.size };
}
