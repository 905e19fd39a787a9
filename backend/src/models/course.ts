import mongoose, { Schema } from 'mongoose';

export interface CourseDoc {
  _id: mongoose.Types.ObjectId;
  code: string;
  title: string;
  instructor: string | null;
  credits: number | null;
  owner_email: string;
}

const CourseSchema = new Schema<CourseDoc>(
  {
    code: { type: String, required: true },
    title: { type: String, required: true },
    instructor: { type: String, required: false, default: null },
    credits: { type: Number, required: false, min: 0, max: 10, default: null },
    owner_email: { type: String, required: true },
  },
  { collection: 'course', autoIndex: false, versionKey: false }
);

CourseSchema.index({ owner_email: 1 });

export const CourseModel = mongoose.model<CourseDoc>('Course', CourseSchema);
