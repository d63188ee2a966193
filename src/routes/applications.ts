import express from "express";
import { Request, Response } from "express";
import Application from "../models/Application";
import Job from "../models/Job";
import JobSeekerProfile from "../models/JobSeekerProfile";
import authMiddleware, { currentUser, requireRole } from "../middleware/auth.middleware";
import { createApplicationSchema, updateStatusSchema } from "../validation/application";
import { pagination } from "../validation/common";
import { canTransition } from "../util/applicationStatus";
import { isOwnerOrAdmin } from "../util/access";
import { HttpError } from "../util/HttpError";

const router = express.Router();

router.use(authMiddleware);

router.post("/", requireRole("job_seeker"), async (req: Request, res: Response) => {
    const { job_id, cover_letter, resume_url } = createApplicationSchema.parse(req.body);
    const user = currentUser(req);

    const job = await Job.findOne({ _id: job_id, is_active: true });
    if (!job) {
        throw new HttpError(404, "Job not found");
    }
    const existing = await Application.exists({ user_id: user._id, job_id: job._id });
    if (existing) {
        throw new HttpError(409, "Application already submitted for this job");
    }

    // fall back to the resume on the seeker's profile
    let resume = resume_url;
    if (!resume) {
        const profile = await JobSeekerProfile.findOne({ user_id: user._id });
        resume = profile?.resume_url;
    }

    const application = await Application.insertOne({
        job_id: job._id,
        user_id: user._id,
        cover_letter,
        resume_url: resume,
    });
    await Job.updateOne({ _id: job._id }, { $inc: { application_count: 1 } });

    res.status(201).json(application);
});

router.get("/", async (req: Request, res: Response) => {
    const { skip, limit } = pagination.parse(req.query);
    const applications = await Application.find({ user_id: currentUser(req)._id })
        .sort({ created_at: -1 })
        .skip(skip)
        .limit(limit)
        .populate("job_id", "title company location work_mode");
    res.json(applications);
});

router.get("/job/:jobId", async (req: Request, res: Response) => {
    const job = await Job.findById(req.params.jobId);
    if (!job) {
        throw new HttpError(404, "Job not found");
    }
    if (!isOwnerOrAdmin(job.posted_by, currentUser(req))) {
        throw new HttpError(403, "Not authorized to view applications for this job");
    }
    const applications = await Application.find({ job_id: job._id })
        .sort({ created_at: -1 })
        .populate("user_id", "full_name email mobile");
    res.json(applications);
});

router.get("/:id", async (req: Request, res: Response) => {
    const user = currentUser(req);
    const application = await Application.findById(req.params.id);
    if (!application) {
        throw new HttpError(404, "Application not found");
    }

    const isApplicant = application.user_id.equals(user._id);
    let isJobOwner = false;
    if (!isApplicant) {
        const job = await Job.findById(application.job_id);
        isJobOwner = job !== null && job.posted_by.equals(user._id);
    }
    // do not reveal that someone else's application exists
    if (!isApplicant && !isJobOwner && user.role !== "admin") {
        throw new HttpError(404, "Application not found");
    }

    if (isJobOwner && !application.viewed_at) {
        application.viewed_at = new Date();
        await application.save();
    }
    res.json(application);
});

router.patch("/:id/status", requireRole("employer", "admin"), async (req: Request, res: Response) => {
    const { status, notes } = updateStatusSchema.parse(req.body);
    const application = await Application.findById(req.params.id);
    if (!application) {
        throw new HttpError(404, "Application not found");
    }
    const job = await Job.findById(application.job_id);
    if (!job) {
        throw new HttpError(404, "Job not found");
    }
    if (!isOwnerOrAdmin(job.posted_by, currentUser(req))) {
        throw new HttpError(403, "Not authorized to update this application");
    }
    if (!canTransition(application.status, status)) {
        throw new HttpError(409, `Cannot move application from ${application.status} to ${status}`);
    }

    application.status = status;
    if (notes !== undefined) {
        application.notes = notes;
    }
    await application.save();
    res.json(application);
});

// withdrawal by the applicant, or removal by an admin
router.delete("/:id", async (req: Request, res: Response) => {
    const application = await Application.findById(req.params.id);
    if (!application) {
        throw new HttpError(404, "Application not found");
    }
    if (!isOwnerOrAdmin(application.user_id, currentUser(req))) {
        throw new HttpError(403, "Not authorized to delete this application");
    }
    await Application.deleteOne({ _id: application._id });
    await Job.updateOne(
        { _id: application.job_id, application_count: { $gt: 0 } },
        { $inc: { application_count: -1 } },
    );
    res.json({ message: "Application deleted successfully" });
});

export default router;
