/**
 * Storage contract for planned events and RSVPs.
 * - Implemented on MongoDB by event.service.ts
 * - Does NOT assume any UI (no Telegram objects)
 */

export const RSVP_STATUSES = ["yes", "no", "maybe"] as const;

export type RsvpStatus = (typeof RSVP_STATUSES)[number];

export type PlannedEvent = {
  id: number;
  organizerId: number;
  title: string;
  type: string;
  time: string;
  location: string;
  createdAt: Date;
};

export type RsvpRecord = {
  eventId: number;
  responderId: number;
  status: RsvpStatus;
  updatedAt: Date;
};

export type RsvpCounts = Record<RsvpStatus, number>;

export type NewEventInput = {
  title: string;
  type: string;
  time: string;
  location: string;
};

export interface EventStore {
  createEvent(organizerId: number, input: NewEventInput): Promise<PlannedEvent>;
  getEvent(eventId: number): Promise<PlannedEvent | null>;
  /** Removes the event and its RSVPs. False when nothing owned by `requesterId` matched. */
  deleteEvent(eventId: number, requesterId: number): Promise<boolean>;
  /** Newest first. */
  listEventsByUser(organizerId: number): Promise<PlannedEvent[]>;

  /** Insert-or-update by (eventId, responderId). Throws NotFoundError for a missing event. */
  upsertRsvp(eventId: number, responderId: number, status: RsvpStatus): Promise<RsvpRecord>;
  /** Insert-if-absent. An existing status is returned untouched. */
  joinEvent(eventId: number, responderId: number, defaultStatus: RsvpStatus): Promise<RsvpRecord>;
  getRsvp(eventId: number, responderId: number): Promise<RsvpRecord | null>;
  rsvpCounts(eventId: number): Promise<RsvpCounts>;
}

export function isRsvpStatus(value: string): value is RsvpStatus {
  return RSVP_STATUSES.some((s) => s === value);
}

export function emptyCounts(): RsvpCounts {
  return { yes: 0, no: 0, maybe: 0 };
}
