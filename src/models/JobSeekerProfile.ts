import mongoose, { HydratedDocument, Types } from "mongoose";

export interface ISkill {
  name: string;
  version?: string;
  experience_months?: number;
}

export interface IEducation {
  institution: string;
  degree: string;
  field_of_study: string;
  start_date: Date;
  end_date?: Date;
  grade?: string;
  description?: string;
}

export interface IEmployment {
  company: string;
  designation: string;
  start_date: Date;
  end_date?: Date;
  is_current: boolean;
  description?: string;
}

export interface IProject {
  title: string;
  description?: string;
  url?: string;
}

export interface IPersonalDetails {
  dob?: Date;
  gender?: string;
  current_location?: string;
  languages: string[];
  resume_headline?: string;
}

export interface IJobSeekerProfile {
  user_id: Types.ObjectId;
  phone?: string;
  skills: ISkill[];
  experience_years?: number;
  education: IEducation[];
  employment_history: IEmployment[];
  projects: IProject[];
  personal_details?: IPersonalDetails;
  social_links: Map<string, string>;
  preferred_locations: string[];
  resume_url?: string;
  profile_completion_pct: number;
  created_at: Date;
  updated_at: Date;
}

export type JobSeekerProfileDocument = HydratedDocument<IJobSeekerProfile>;

const skillSchema = new mongoose.Schema<ISkill>({
  name: { type: String, required: true, trim: true },
  version: String,
  experience_months: { type: Number, min: 0 },
}, { _id: false });

const educationSchema = new mongoose.Schema<IEducation>({
  institution: { type: String, required: true },
  degree: { type: String, required: true },
  field_of_study: { type: String, required: true },
  start_date: { type: Date, required: true },
  end_date: Date,
  grade: String,
  description: String,
});

const employmentSchema = new mongoose.Schema<IEmployment>({
  company: { type: String, required: true },
  designation: { type: String, required: true },
  start_date: { type: Date, required: true },
  end_date: Date,
  is_current: { type: Boolean, default: false },
  description: String,
});

const projectSchema = new mongoose.Schema<IProject>({
  title: { type: String, required: true },
  description: String,
  url: String,
});

const jobSeekerProfileSchema = new mongoose.Schema<IJobSeekerProfile>({
  user_id: { type: mongoose.Schema.Types.ObjectId, ref: "User", required: true, unique: true },
  phone: { type: String },
  skills: [skillSchema],
  experience_years: { type: Number, min: 0 },
  education: [educationSchema],
  employment_history: [employmentSchema],
  projects: [projectSchema],
  personal_details: {
    dob: Date,
    gender: String,
    current_location: String,
    languages: [String],
    resume_headline: String,
  },
  social_links: { type: Map, of: String, default: {} },
  preferred_locations: [{ type: String, trim: true }],
  // S3 object key
  resume_url: { type: String },
  profile_completion_pct: {
    type: Number,
    min: 0,
    max: 100,
    default: 0,
    validate: { validator: Number.isInteger, message: "profile_completion_pct must be an integer" },
  },
}, { timestamps: { createdAt: "created_at", updatedAt: "updated_at" } });

jobSeekerProfileSchema.index({ "skills.name": 1 });

export default mongoose.model<IJobSeekerProfile>("JobSeekerProfile", jobSeekerProfileSchema);
