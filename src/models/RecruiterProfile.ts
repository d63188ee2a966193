import mongoose, { Types } from "mongoose";

export interface IRecruiterProfile {
  user_id: Types.ObjectId;
  company_name?: string;
  company_logo?: string;
  designation?: string;
  company_website?: string;
  industry?: string;
  created_at: Date;
  updated_at: Date;
}

const recruiterProfileSchema = new mongoose.Schema<IRecruiterProfile>({
  user_id: { type: mongoose.Schema.Types.ObjectId, ref: "User", required: true, unique: true },
  company_name: { type: String, trim: true },
  // S3 object key
  company_logo: { type: String },
  designation: { type: String, trim: true },
  company_website: { type: String, trim: true },
  industry: { type: String, trim: true },
}, { timestamps: { createdAt: "created_at", updatedAt: "updated_at" } });

export default mongoose.model<IRecruiterProfile>("RecruiterProfile", recruiterProfileSchema);
