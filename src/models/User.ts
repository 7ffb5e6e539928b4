import mongoose, { Document, Schema } from 'mongoose';
import { v4 as uuidv4 } from 'uuid';

export interface IUser extends Document<string> {
  email: string;
  username: string;
  hashedPassword: string;
  isActive: boolean;
  isSuperuser: boolean;
  createdAt: Date;
  updatedAt: Date;
}

/** Stored user. `hashed_password` never leaves the access layer. */
export interface UserRecord {
  id: string;
  email: string;
  username: string;
  hashed_password: string;
  is_active: boolean;
  is_superuser: boolean;
  created_at: Date;
  updated_at: Date;
}

export type PublicUser = Omit<UserRecord, 'hashed_password' | 'updated_at'>;

const UserSchema = new Schema<IUser>(
  {
    _id: {
      type: String,
      default: () => uuidv4(),
    },
    email: {
      type: String,
      required: true,
      unique: true,
      lowercase: true,
      trim: true,
    },
    username: {
      type: String,
      required: true,
      unique: true,
      trim: true,
    },
    hashedPassword: {
      type: String,
      required: true,
    },
    isActive: {
      type: Boolean,
      default: true,
    },
    isSuperuser: {
      type: Boolean,
      default: false,
    },
  },
  {
    timestamps: true,
  },
);

export function toUserRecord(doc: IUser): UserRecord {
  return {
    id: String(doc._id),
    email: doc.email,
    username: doc.username,
    hashed_password: doc.hashedPassword,
    is_active: doc.isActive,
    is_superuser: doc.isSuperuser,
    created_at: doc.createdAt,
    updated_at: doc.updatedAt,
  };
}

export function toPublicUser(user: UserRecord): PublicUser {
  return {
    id: user.id,
    email: user.email,
    username: user.username,
    is_active: user.is_active,
    is_superuser: user.is_superuser,
    created_at: user.created_at,
  };
}

export default mongoose.model<IUser>('User', UserSchema);
