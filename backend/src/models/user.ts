import mongoose, { Schema } from 'mongoose';

export interface UserDoc {
  _id: mongoose.Types.ObjectId;
  name: string;
  email: string;
  password_hash: string;
  major: string | null;
  year: string | null;
  avatar: string | null;
}

const UserSchema = new Schema<UserDoc>(
  {
    name: { type: String, required: true, minlength: 2, maxlength: 80 },
    email: { type: String, required: true },
    // SHA-256 hex of the password, never the password itself
    password_hash: { type: String, required: true },
    major: { type: String, required: false, maxlength: 80, default: null },
    year: { type: String, required: false, default: null },
    avatar: { type: String, required: false, default: null },
  },
  { collection: 'user', autoIndex: false, versionKey: false }
);

UserSchema.index({ email: 1 }, { unique: true });

export const UserModel = mongoose.model<UserDoc>('User', UserSchema);
