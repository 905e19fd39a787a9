import mongoose, { Schema } from 'mongoose';

export interface ScheduleEntryDoc {
  _id: mongoose.Types.ObjectId;
  owner_email: string;
  title: string;
  day: string;
  start_time: string;
  end_time: string;
  location: string | null;
  notes: string | null;
  color: string | null;
}

const ScheduleEntrySchema = new Schema<ScheduleEntryDoc>(
  {
    owner_email: { type: String, required: true },
    title: { type: String, required: true },
    // Mon..Sun by convention, not enforced
    day: { type: String, required: true },
    start_time: { type: String, required: true },
    end_time: { type: String, required: true },
    location: { type: String, required: false, default: null },
    notes: { type: String, required: false, default: null },
    color: { type: String, required: false, default: null },
  },
  { collection: 'scheduleentry', autoIndex: false, versionKey: false }
);

ScheduleEntrySchema.index({ owner_email: 1, day: 1 });

export const ScheduleEntryModel = mongoose.model<ScheduleEntryDoc>('ScheduleEntry', ScheduleEntrySchema);
