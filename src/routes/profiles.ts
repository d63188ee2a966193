import express from "express";
import { Request, Response } from "express";
import { FilterQuery } from "mongoose";
import JobSeekerProfile, { IJobSeekerProfile } from "../models/JobSeekerProfile";
import RecruiterProfile from "../models/RecruiterProfile";
import User from "../models/User";
import authMiddleware, { currentUser, requireRole } from "../middleware/auth.middleware";
import { candidateSearchSchema, jobSeekerProfileSchema, recruiterProfileSchema } from "../validation/profile";
import { computeProfileCompletion } from "../util/profileCompletion";
import { escapeRegex, splitList } from "../util/jobQuery";
import { deleteFile, generateSignedUrl, uploadFile } from "../util/s3";
import { imageUpload, resumeUpload } from "../util/upload";
import { HttpError } from "../util/HttpError";

const router = express.Router();

router.use(authMiddleware);

// keys written by uploadFile; anything else was supplied as an external link
const isStoredKey = (value?: string): value is string => !!value && /^[a-f0-9]{64}$/.test(value);

const replaceStoredFile = async (previous?: string) => {
    if (!isStoredKey(previous)) return;
    try {
        await deleteFile(previous);
    } catch (error) {
        console.error("Failed to delete replaced file", error);
    }
};

// job seeker profile
router.post("/job-seeker", requireRole("job_seeker"), async (req: Request, res: Response) => {
    const body = jobSeekerProfileSchema.parse(req.body);
    const user = currentUser(req);
    if (await JobSeekerProfile.exists({ user_id: user._id })) {
        throw new HttpError(409, "Job seeker profile already exists");
    }
    const profile = new JobSeekerProfile({ ...body, user_id: user._id });
    profile.profile_completion_pct = computeProfileCompletion(profile);
    await profile.save();
    res.status(201).json(profile);
});

router.put("/job-seeker", requireRole("job_seeker"), async (req: Request, res: Response) => {
    const body = jobSeekerProfileSchema.parse(req.body);
    const profile = await JobSeekerProfile.findOne({ user_id: currentUser(req)._id });
    if (!profile) {
        throw new HttpError(404, "Job seeker profile not found");
    }
    profile.set(body);
    profile.profile_completion_pct = computeProfileCompletion(profile);
    await profile.save();
    res.json(profile);
});

router.get("/job-seeker/me", requireRole("job_seeker"), async (req: Request, res: Response) => {
    const profile = await JobSeekerProfile.findOne({ user_id: currentUser(req)._id });
    if (!profile) {
        throw new HttpError(404, "Job seeker profile not found");
    }
    res.json(profile);
});

router.post("/job-seeker/resume", requireRole("job_seeker"), resumeUpload.single("resume"), async (req: Request, res: Response) => {
    if (!req.file) {
        throw new HttpError(400, "Resume file not uploaded");
    }
    const user = currentUser(req);
    const key = await uploadFile(req.file);

    const profile = await JobSeekerProfile.findOne({ user_id: user._id }) ?? new JobSeekerProfile({ user_id: user._id });
    const previous = profile.resume_url;
    profile.resume_url = key;
    profile.profile_completion_pct = computeProfileCompletion(profile);
    await profile.save();
    await replaceStoredFile(previous);

    res.status(201).json({
        resume_url: key,
        url: await generateSignedUrl(key),
        profile_completion_pct: profile.profile_completion_pct,
    });
});

// recruiter profile
router.post("/recruiter", requireRole("employer"), async (req: Request, res: Response) => {
    const body = recruiterProfileSchema.parse(req.body);
    const user = currentUser(req);
    if (await RecruiterProfile.exists({ user_id: user._id })) {
        throw new HttpError(409, "Recruiter profile already exists");
    }
    const profile = await RecruiterProfile.create({ ...body, user_id: user._id });
    res.status(201).json(profile);
});

router.put("/recruiter", requireRole("employer"), async (req: Request, res: Response) => {
    const body = recruiterProfileSchema.parse(req.body);
    const profile = await RecruiterProfile.findOne({ user_id: currentUser(req)._id });
    if (!profile) {
        throw new HttpError(404, "Recruiter profile not found");
    }
    profile.set(body);
    await profile.save();
    res.json(profile);
});

router.get("/recruiter/me", requireRole("employer"), async (req: Request, res: Response) => {
    const profile = await RecruiterProfile.findOne({ user_id: currentUser(req)._id });
    if (!profile) {
        throw new HttpError(404, "Recruiter profile not found");
    }
    const logoUrl = isStoredKey(profile.company_logo) ? await generateSignedUrl(profile.company_logo) : profile.company_logo;
    res.json({ ...profile.toJSON(), company_logo_url: logoUrl });
});

router.post("/recruiter/logo", requireRole("employer"), imageUpload.single("logo"), async (req: Request, res: Response) => {
    if (!req.file) {
        throw new HttpError(400, "Company logo not uploaded");
    }
    const profile = await RecruiterProfile.findOne({ user_id: currentUser(req)._id });
    if (!profile) {
        throw new HttpError(404, "Recruiter profile not found");
    }
    const key = await uploadFile(req.file);
    const previous = profile.company_logo;
    profile.company_logo = key;
    await profile.save();
    await replaceStoredFile(previous);

    res.status(201).json({ company_logo: key, url: await generateSignedUrl(key) });
});

// candidate search for recruiters
router.get("/candidates", requireRole("employer", "admin"), async (req: Request, res: Response) => {
    const { skills, experience_min, location } = candidateSearchSchema.parse(req.query);

    const filter: FilterQuery<IJobSeekerProfile> = {};
    const skillList = splitList(skills);
    if (skillList.length > 0) {
        filter["skills.name"] = { $in: skillList.map((skill) => new RegExp(`^${escapeRegex(skill)}$`, "i")) };
    }
    if (experience_min != null) {
        filter.experience_years = { $gte: experience_min };
    }
    if (location) {
        filter.preferred_locations = { $regex: escapeRegex(location), $options: "i" };
    }

    const profiles = await JobSeekerProfile.find(filter, null, { sort: { profile_completion_pct: -1 }, limit: 100 });
    // deactivated or deleted accounts drop out here
    const owners = await User.find({ _id: { $in: profiles.map((profile) => profile.user_id) }, is_active: true }, "full_name email");
    const ownersById = new Map(owners.map((owner) => [owner._id.toString(), owner]));

    const candidates = profiles.flatMap((profile) => {
        const owner = ownersById.get(profile.user_id.toString());
        if (!owner) return [];
        return [{
            id: profile._id,
            full_name: owner.full_name,
            email: owner.email,
            phone: profile.phone,
            skills: profile.skills,
            experience_years: profile.experience_years,
            preferred_locations: profile.preferred_locations,
            resume_url: profile.resume_url,
            profile_completion_pct: profile.profile_completion_pct,
        }];
    });
    res.json(candidates);
});

export default router;
