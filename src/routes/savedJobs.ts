import express from "express";
import { Request, Response } from "express";
import SavedJob from "../models/SavedJob";
import Job from "../models/Job";
import authMiddleware, { currentUser, requireRole } from "../middleware/auth.middleware";
import { saveJobSchema } from "../validation/application";
import { HttpError } from "../util/HttpError";

const router = express.Router();

router.use(authMiddleware, requireRole("job_seeker"));

router.post("/", async (req: Request, res: Response) => {
    const { job_id } = saveJobSchema.parse(req.body);
    const user = currentUser(req);

    const job = await Job.findById(job_id);
    if (!job) {
        throw new HttpError(404, "Job not found");
    }
    const existing = await SavedJob.exists({ user_id: user._id, job_id: job._id });
    if (existing) {
        throw new HttpError(409, "Job already saved");
    }

    const savedJob = await SavedJob.create({ user_id: user._id, job_id: job._id });
    res.status(201).json(savedJob);
});

router.get("/", async (req: Request, res: Response) => {
    const savedJobs = await SavedJob.find({ user_id: currentUser(req)._id }, null, { sort: { created_at: -1 } });
    const jobs = await Job.find(
        { _id: { $in: savedJobs.map((saved) => saved.job_id) } },
        "title company location salary_min salary_max experience_required work_mode skills is_active",
    );
    const jobsById = new Map(jobs.map((job) => [job._id.toString(), job]));

    // bookmarks whose job was removed are skipped
    const result = savedJobs.flatMap((saved) => {
        const job = jobsById.get(saved.job_id.toString());
        return job ? [{ id: saved._id, job, created_at: saved.created_at }] : [];
    });
    res.json(result);
});

router.delete("/:id", async (req: Request, res: Response) => {
    const deleted = await SavedJob.findOneAndDelete({ _id: req.params.id, user_id: currentUser(req)._id });
    if (!deleted) {
        throw new HttpError(404, "Saved job not found");
    }
    res.json({ message: "Job unsaved successfully" });
});

export default router;
