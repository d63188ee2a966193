import request from "supertest";
import { describe, expect, it, vi } from "vitest";
import { createApp } from "../app";
import Job from "../models/Job";
import SavedJob from "../models/SavedJob";
import { authenticateAs, makeUser } from "../test/helpers";

const app = createApp();
const jobId = "64b7f0c2a1b2c3d4e5f60718";

describe("POST /api/saved-jobs", () => {
    it("answers 404 for an unknown job", async () => {
        const auth = authenticateAs(makeUser("job_seeker"));
        vi.spyOn(Job, "findById").mockResolvedValue(null);
        const res = await request(app).post("/api/saved-jobs").set("Authorization", auth).send({ job_id: jobId });
        expect(res.status).toBe(404);
        expect(res.body).toEqual({ message: "Job not found" });
    });

    it("refuses to save the same job twice", async () => {
        const seeker = makeUser("job_seeker");
        const auth = authenticateAs(seeker);
        const job = new Job({ title: "QA Engineer", description: "Test things.", company: "Acme Corp", location: "Delhi", posted_by: makeUser("employer")._id });
        vi.spyOn(Job, "findById").mockResolvedValue(job);
        vi.spyOn(SavedJob, "exists").mockResolvedValue({ _id: job._id });

        const res = await request(app).post("/api/saved-jobs").set("Authorization", auth).send({ job_id: job._id.toString() });
        expect(res.status).toBe(409);
        expect(res.body).toEqual({ message: "Job already saved" });
    });

    it("rejects a malformed id", async () => {
        const auth = authenticateAs(makeUser("job_seeker"));
        const res = await request(app).post("/api/saved-jobs").set("Authorization", auth).send({ job_id: "123" });
        expect(res.status).toBe(400);
        expect(res.body.errors).toEqual([{ path: "job_id", message: "Invalid id" }]);
    });
});

describe("DELETE /api/saved-jobs/:id", () => {
    it("only removes the caller's own bookmark", async () => {
        const seeker = makeUser("job_seeker");
        const auth = authenticateAs(seeker);
        const remove = vi.spyOn(SavedJob, "findOneAndDelete").mockResolvedValue(null);

        const res = await request(app).delete(`/api/saved-jobs/${jobId}`).set("Authorization", auth);
        expect(res.status).toBe(404);
        expect(res.body).toEqual({ message: "Saved job not found" });
        expect(remove).toHaveBeenCalledWith({ _id: jobId, user_id: seeker._id });
    });
});

describe("GET /api/saved-jobs", () => {
    it("skips bookmarks whose job no longer exists", async () => {
        const seeker = makeUser("job_seeker");
        const auth = authenticateAs(seeker);
        const live = new Job({ title: "Frontend Developer", description: "Ship UI.", company: "Acme Corp", location: "Chennai", posted_by: makeUser("employer")._id });
        const kept = new SavedJob({ user_id: seeker._id, job_id: live._id });
        const orphan = new SavedJob({ user_id: seeker._id, job_id: "64b7f0c2a1b2c3d4e5f60718" });
        const listSaved = vi.spyOn(SavedJob, "find").mockResolvedValue([kept, orphan]);
        const listJobs = vi.spyOn(Job, "find").mockResolvedValue([live]);

        const res = await request(app).get("/api/saved-jobs").set("Authorization", auth);
        expect(res.status).toBe(200);
        expect(res.body).toHaveLength(1);
        expect(res.body[0].id).toBe(kept._id.toString());
        expect(res.body[0].job.title).toBe("Frontend Developer");
        expect(listSaved).toHaveBeenCalledWith({ user_id: seeker._id }, null, { sort: { created_at: -1 } });
        expect(listJobs).toHaveBeenCalledWith(
            { _id: { $in: [live._id, orphan.job_id] } },
            "title company location salary_min salary_max experience_required work_mode skills is_active",
        );
    });
});
