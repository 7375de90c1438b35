// models/Counter.ts
import mongoose, { Schema, Model } from "mongoose";

export type CounterDoc = {
  _id: string; // sequence name, e.g. "events"
  seq: number;
};

const CounterSchema = new Schema<CounterDoc>(
  {
    _id: { type: String, required: true },
    seq: { type: Number, required: true, default: 0 },
  },
  { timestamps: false, versionKey: false }
);

export const Counter: Model<CounterDoc> =
  (mongoose.models.Counter as Model<CounterDoc>) ||
  mongoose.model<CounterDoc>("Counter", CounterSchema);

export async function nextSequence(name: string): Promise<number> {
  const doc = await Counter.findOneAndUpdate(
    { _id: name },
    { $inc: { seq: 1 } },
    { upsert: true, new: true }
  ).lean();

  if (!doc) throw new Error(`Counter ${name} could not be incremented`);
  return doc.seq;
}
