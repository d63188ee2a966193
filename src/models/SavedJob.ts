import mongoose, { Types } from "mongoose";

export interface ISavedJob {
  user_id: Types.ObjectId;
  job_id: Types.ObjectId;
  created_at: Date;
  updated_at: Date;
}

const savedJobSchema = new mongoose.Schema<ISavedJob>({
  user_id: { type: mongoose.Schema.Types.ObjectId, ref: "User", required: true },
  job_id: { type: mongoose.Schema.Types.ObjectId, ref: "Job", required: true },
}, { timestamps: { createdAt: "created_at", updatedAt: "updated_at" } });

savedJobSchema.index({ user_id: 1, job_id: 1 }, { unique: true });

export default mongoose.model<ISavedJob>("SavedJob", savedJobSchema);
