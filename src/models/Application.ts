import mongoose, { HydratedDocument, Types } from "mongoose";

// pipeline order matters: see util/applicationStatus
export const APPLICATION_STATUSES = ["applied", "reviewed", "interview", "offered", "accepted", "rejected"] as const;
export type ApplicationStatus = (typeof APPLICATION_STATUSES)[number];

export interface IApplication {
  job_id: Types.ObjectId;
  user_id: Types.ObjectId;
  status: ApplicationStatus;
  cover_letter?: string;
  resume_url?: string;
  notes?: string;
  viewed_at?: Date;
  created_at: Date;
  updated_at: Date;
}

export type ApplicationDocument = HydratedDocument<IApplication>;

const applicationSchema = new mongoose.Schema<IApplication>({
  job_id: {
    type: mongoose.Schema.Types.ObjectId,
    ref: 'Job',
    required: true,
  },
  user_id: {
    type: mongoose.Schema.Types.ObjectId,
    ref: 'User',
    required: true,
  },
  status: {
    type: String,
    enum: [...APPLICATION_STATUSES],
    default: 'applied',
  },
  cover_letter: {
    type: String,
    maxlength: 5000,
  },
  resume_url: {
    type: String,
  },
  notes: {
    type: String,
  },
  viewed_at: {
    type: Date,
  },
}, {
  timestamps: { createdAt: "created_at", updatedAt: "updated_at" },
});

applicationSchema.index({ user_id: 1, job_id: 1 }, { unique: true });
applicationSchema.index({ job_id: 1, status: 1 });

export default mongoose.model<IApplication>('Application', applicationSchema);
