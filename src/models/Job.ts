import mongoose, { HydratedDocument, Types } from "mongoose";

export const WORK_MODES = ["remote", "onsite", "hybrid"] as const;
export type WorkMode = (typeof WORK_MODES)[number];

export const JOB_TYPES = ["full_time", "part_time", "contract", "internship", "freelance"] as const;
export type JobType = (typeof JOB_TYPES)[number];

export interface IJob {
  title: string;
  description: string;
  company: string;
  location: string;
  salary_min?: number;
  salary_max?: number;
  skills: string[];
  experience_required?: number;
  work_mode?: WorkMode;
  job_type: JobType;
  company_logo_url?: string;
  posted_by: Types.ObjectId;
  application_count: number;
  view_count: number;
  is_active: boolean;
  created_at: Date;
  updated_at: Date;
}

export type JobDocument = HydratedDocument<IJob>;

const jobSchema = new mongoose.Schema<IJob>({
  title: { type: String, required: true, trim: true },
  description: { type: String, required: true },
  company: { type: String, required: true, trim: true },
  location: { type: String, required: true, trim: true },
  salary_min: { type: Number, min: 0 },
  salary_max: {
    type: Number,
    min: 0,
    validate: {
      validator: function (this: IJob, value: number | undefined) {
        return value == null || this.salary_min == null || value >= this.salary_min;
      },
      message: "salary_max must not be lower than salary_min",
    },
  },
  skills: [{ type: String, trim: true }],
  // years
  experience_required: { type: Number, min: 0 },
  work_mode: { type: String, enum: [...WORK_MODES] },
  job_type: { type: String, enum: [...JOB_TYPES], default: "full_time" },
  company_logo_url: { type: String },
  posted_by: { type: mongoose.Schema.Types.ObjectId, ref: "User", required: true },
  application_count: { type: Number, default: 0, min: 0 },
  view_count: { type: Number, default: 0, min: 0 },
  is_active: { type: Boolean, default: true },
}, { timestamps: { createdAt: "created_at", updatedAt: "updated_at" } });

jobSchema.index({ title: "text", description: "text" });
jobSchema.index({ posted_by: 1 });
jobSchema.index({ is_active: 1, created_at: -1 });

export default mongoose.model<IJob>("Job", jobSchema);
