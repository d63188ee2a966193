import mongoose, { HydratedDocument } from "mongoose";

export const USER_ROLES = ["job_seeker", "employer", "admin"] as const;
export type UserRole = (typeof USER_ROLES)[number];

export interface IUser {
  email: string;
  hashed_password: string;
  full_name: string;
  role: UserRole;
  mobile?: string;
  is_verified: boolean;
  is_active: boolean;
  created_at: Date;
  updated_at: Date;
}

export type UserDocument = HydratedDocument<IUser>;

const userSchema = new mongoose.Schema<IUser>({
  email: {
    type: String,
    required: true,
    unique: true,
    lowercase: true,
    trim: true,
    match: [/^[a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+\.[a-zA-Z]{2,}$/, "Invalid email format"],
  },
  hashed_password: { type: String, required: true },
  full_name: { type: String, required: true, trim: true },
  role: { type: String, enum: [...USER_ROLES], default: "job_seeker" },
  mobile: { type: String, match: [/^\d{10}$/, "Mobile number must be 10 digits"] },
  is_verified: { type: Boolean, default: false },
  is_active: { type: Boolean, default: true },
}, { timestamps: { createdAt: "created_at", updatedAt: "updated_at" } });

userSchema.index({ role: 1 });

const User = mongoose.model<IUser>("User", userSchema);

// everything a client may see; the password hash never leaves the server
export const toPublicUser = (user: UserDocument) => ({
  id: user._id.toString(),
  email: user.email,
  full_name: user.full_name,
  role: user.role,
  mobile: user.mobile,
  is_verified: user.is_verified,
  is_active: user.is_active,
  created_at: user.created_at,
});

export default User;
