// models/Rsvp.ts
import mongoose, { Schema, Model, Types } from "mongoose";
import { RSVP_STATUSES, type RsvpStatus } from "../services/eventStore";

export type RsvpDoc = {
  _id: Types.ObjectId;
  eventId: number;
  userId: number;
  status: RsvpStatus;
  updatedAt: Date;
};

const RsvpSchema = new Schema<RsvpDoc>(
  {
    eventId: {
      type: Number,
      ref: "Event",
      required: true,
      index: true,
    },
    userId: {
      type: Number,
      required: true,
    },
    status: {
      type: String,
      enum: [...RSVP_STATUSES],
      required: true,
      default: "maybe",
    },
    updatedAt: {
      type: Date,
      required: true,
      default: () => new Date(),
    },
  },
  { timestamps: false }
);

// one row per responder per event
RsvpSchema.index({ eventId: 1, userId: 1 }, { unique: true });

export const Rsvp: Model<RsvpDoc> =
  (mongoose.models.Rsvp as Model<RsvpDoc>) ||
  mongoose.model<RsvpDoc>("Rsvp", RsvpSchema);
