import mongoose, { Schema } from 'mongoose';

export interface AnnouncementDoc {
  _id: mongoose.Types.ObjectId;
  title: string;
  body: string;
  visible: boolean;
}

const AnnouncementSchema = new Schema<AnnouncementDoc>(
  {
    title: { type: String, required: true },
    body: { type: String, required: true },
    visible: { type: Boolean, required: true, default: true },
  },
  { collection: 'announcement', autoIndex: false, versionKey: false }
);

export const AnnouncementModel = mongoose.model<AnnouncementDoc>('Announcement', AnnouncementSchema);
