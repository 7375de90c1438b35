import { Event, EventDoc } from "../models/Event";
import { Rsvp, RsvpDoc } from "../models/Rsvp";
import { nextSequence } from "../models/Counter";
import { NotFoundError, ValidationError } from "../errors";
import {
  EventStore,
  NewEventInput,
  PlannedEvent,
  RsvpRecord,
  RsvpStatus,
  emptyCounts,
  isRsvpStatus,
} from "./eventStore";

/**
 * Events + RSVPs on MongoDB
 * - Integer event ids come from the "events" counter
 * - RSVP uniqueness is the (eventId, userId) unique index; writes are single upserts
 * - Cascade on delete lives in the Event model's findOneAndDelete hook
 */

type EventRow = Pick<EventDoc, "_id" | "organizerId" | "title" | "type" | "time" | "location" | "createdAt">;
type RsvpRow = Pick<RsvpDoc, "eventId" | "userId" | "status" | "updatedAt">;

function assertUserId(userId: number) {
  if (!Number.isInteger(userId)) throw new Error("Missing userId");
}

function assertFilled(input: NewEventInput) {
  for (const key of ["title", "type", "time", "location"] as const) {
    if (!input[key]?.trim()) throw new ValidationError(`${key} is required`, key);
  }
}

function isDuplicateKeyError(e: unknown): boolean {
  return typeof e === "object" && e !== null && "code" in e && e.code === 11000;
}

// Two concurrent upserts on a missing key can both try to insert; the loser sees E11000
// and its retry matches the winner's row.
async function retryOnDuplicate<T>(write: () => Promise<T>): Promise<T> {
  try {
    return await write();
  } catch (e) {
    if (!isDuplicateKeyError(e)) throw e;
    return write();
  }
}

function toEvent(doc: EventRow): PlannedEvent {
  return {
    id: doc._id,
    organizerId: doc.organizerId,
    title: doc.title,
    type: doc.type,
    time: doc.time,
    location: doc.location,
    createdAt: doc.createdAt,
  };
}

function toRsvp(doc: RsvpRow): RsvpRecord {
  return {
    eventId: doc.eventId,
    responderId: doc.userId,
    status: doc.status,
    updatedAt: doc.updatedAt,
  };
}

async function requireEvent(eventId: number) {
  const exists = await Event.exists({ _id: eventId });
  if (!exists) throw new NotFoundError(`Event ${eventId} not found`);
}

// An RSVP written while its event was being deleted would outlive the cascade.
async function dropIfOrphaned(eventId: number, responderId: number) {
  const exists = await Event.exists({ _id: eventId });
  if (exists) return;
  await Rsvp.deleteOne({ eventId, userId: responderId });
  throw new NotFoundError(`Event ${eventId} not found`);
}

export function createMongoEventStore(): EventStore {
  async function createEvent(organizerId: number, input: NewEventInput): Promise<PlannedEvent> {
    assertUserId(organizerId);
    assertFilled(input);

    const id = await nextSequence("events");
    const doc = await Event.create({
      _id: id,
      organizerId,
      title: input.title,
      type: input.type,
      time: input.time,
      location: input.location,
    });

    return toEvent(doc);
  }

  async function getEvent(eventId: number): Promise<PlannedEvent | null> {
    const doc = await Event.findById(eventId).lean();
    return doc ? toEvent(doc) : null;
  }

  async function deleteEvent(eventId: number, requesterId: number): Promise<boolean> {
    assertUserId(requesterId);
    const doc = await Event.findOneAndDelete({ _id: eventId, organizerId: requesterId }).lean();
    return doc !== null;
  }

  async function listEventsByUser(organizerId: number): Promise<PlannedEvent[]> {
    assertUserId(organizerId);
    const docs = await Event.find({ organizerId }).sort({ createdAt: -1, _id: -1 }).lean();
    return docs.map(toEvent);
  }

  async function upsertRsvp(eventId: number, responderId: number, status: RsvpStatus): Promise<RsvpRecord> {
    assertUserId(responderId);
    await requireEvent(eventId);

    const doc = await retryOnDuplicate(() =>
      Rsvp.findOneAndUpdate(
        { eventId, userId: responderId },
        { $set: { status, updatedAt: new Date() } },
        { upsert: true, new: true }
      ).lean()
    );
    if (!doc) throw new Error(`RSVP upsert returned nothing for event ${eventId}`);

    await dropIfOrphaned(eventId, responderId);
    return toRsvp(doc);
  }

  async function joinEvent(eventId: number, responderId: number, defaultStatus: RsvpStatus): Promise<RsvpRecord> {
    assertUserId(responderId);
    await requireEvent(eventId);

    const doc = await retryOnDuplicate(() =>
      Rsvp.findOneAndUpdate(
        { eventId, userId: responderId },
        { $setOnInsert: { status: defaultStatus, updatedAt: new Date() } },
        { upsert: true, new: true }
      ).lean()
    );
    if (!doc) throw new Error(`RSVP join returned nothing for event ${eventId}`);

    await dropIfOrphaned(eventId, responderId);
    return toRsvp(doc);
  }

  async function getRsvp(eventId: number, responderId: number): Promise<RsvpRecord | null> {
    const doc = await Rsvp.findOne({ eventId, userId: responderId }).lean();
    return doc ? toRsvp(doc) : null;
  }

  async function rsvpCounts(eventId: number) {
    const rows = await Rsvp.aggregate<{ _id: string; total: number }>([
      { $match: { eventId } },
      { $group: { _id: "$status", total: { $sum: 1 } } },
    ]);

    const counts = emptyCounts();
    for (const row of rows) {
      const status = row._id.toLowerCase();
      if (isRsvpStatus(status)) counts[status] = row.total;
    }
    return counts;
  }

  return {
    createEvent,
    getEvent,
    deleteEvent,
    listEventsByUser,
    upsertRsvp,
    joinEvent,
    getRsvp,
    rsvpCounts,
  };
}
