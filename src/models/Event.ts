// models/Event.ts
import mongoose, { Schema, Model } from "mongoose";
import { Rsvp } from "./Rsvp";

export type EventDoc = {
  _id: number; // sequential, see nextSequence("events")
  organizerId: number;
  title: string;
  type: string;
  time: string; // free text, e.g. "Tomorrow 19:00"
  location: string;
  createdAt: Date;
};

const EventSchema = new Schema<EventDoc>(
  {
    _id: { type: Number, required: true },
    organizerId: { type: Number, required: true, index: true },
    title: { type: String, required: true },
    type: { type: String, required: true },
    time: { type: String, required: true },
    location: { type: String, required: true },
  },
  { timestamps: { createdAt: true, updatedAt: false } }
);

EventSchema.index({ organizerId: 1, createdAt: -1 });

const CASCADE_ATTEMPTS = 3;

/**
 * Removes the RSVPs of a deleted event. The event is already gone when this runs,
 * so a failing cleanup is retried and logged instead of failing the delete.
 * Returns false when every attempt failed.
 */
export async function cascadeRsvps(doc: Pick<EventDoc, "_id"> | null): Promise<boolean> {
  if (!doc) return true;

  for (let attempt = 1; attempt <= CASCADE_ATTEMPTS; attempt++) {
    try {
      const res = await Rsvp.deleteMany({ eventId: doc._id });
      console.log(`[STORE] Event ${doc._id} deleted with ${res.deletedCount} RSVP(s)`);
      return true;
    } catch (e) {
      console.error(`[STORE] RSVP cleanup for event ${doc._id} failed (attempt ${attempt}/${CASCADE_ATTEMPTS}):`, e);
    }
  }
  return false;
}

// No foreign keys in MongoDB: RSVPs go with their event.
EventSchema.post("findOneAndDelete", async function (doc: EventDoc | null) {
  await cascadeRsvps(doc);
});

export const Event: Model<EventDoc> =
  (mongoose.models.Event as Model<EventDoc>) ||
  mongoose.model<EventDoc>("Event", EventSchema);
