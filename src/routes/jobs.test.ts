import request from "supertest";
import { describe, expect, it, vi } from "vitest";
import { createApp } from "../app";
import Application from "../models/Application";
import Job from "../models/Job";
import SavedJob from "../models/SavedJob";
import { UserDocument } from "../models/User";
import { authenticateAs, makeUser } from "../test/helpers";

const app = createApp();

const validJob = {
    title: "Backend Engineer",
    description: "Build and run the hiring APIs.",
    company: "Acme Corp",
    location: "Pune",
    salary_min: 800000,
    salary_max: 1200000,
    skills: ["node", "mongodb"],
};

const postedBy = (owner: UserDocument) => new Job({ ...validJob, posted_by: owner._id });

describe("POST /api/jobs", () => {
    it("is limited to employers", async () => {
        const auth = authenticateAs(makeUser("job_seeker"));
        const res = await request(app).post("/api/jobs").set("Authorization", auth).send(validJob);
        expect(res.status).toBe(403);
        expect(res.body).toEqual({ message: "You are not allowed to perform this action." });
    });

    it("rejects a salary range that is upside down", async () => {
        const auth = authenticateAs(makeUser("employer"));
        const res = await request(app)
            .post("/api/jobs")
            .set("Authorization", auth)
            .send({ ...validJob, salary_min: 900000, salary_max: 500000 });
        expect(res.status).toBe(400);
        expect(res.body).toEqual({
            message: "Validation failed",
            errors: [{ path: "salary_max", message: "salary_max must not be lower than salary_min" }],
        });
    });
});

describe("GET /api/jobs/:id", () => {
    it("answers 404 for a missing or inactive posting", async () => {
        const lookup = vi.spyOn(Job, "findOneAndUpdate").mockResolvedValue(null);
        const id = "64b7f0c2a1b2c3d4e5f60718";
        const res = await request(app).get(`/api/jobs/${id}`);
        expect(res.status).toBe(404);
        expect(res.body).toEqual({ message: "Job not found" });
        expect(lookup).toHaveBeenCalledWith({ _id: id, is_active: true }, { $inc: { view_count: 1 } }, { new: true });
    });
});

describe("PUT /api/jobs/:id", () => {
    it("refuses an employer who did not post the job", async () => {
        const job = postedBy(makeUser("employer", { email: "other@example.com" }));
        vi.spyOn(Job, "findById").mockResolvedValue(job);
        const save = vi.spyOn(job, "save");

        const auth = authenticateAs(makeUser("employer"));
        const res = await request(app).put(`/api/jobs/${job._id}`).set("Authorization", auth).send({ title: "Changed" });
        expect(res.status).toBe(403);
        expect(res.body).toEqual({ message: "Not authorized to update this job" });
        expect(save).not.toHaveBeenCalled();
    });

    it("lets the owner update only the fields sent", async () => {
        const owner = makeUser("employer");
        const job = postedBy(owner);
        vi.spyOn(Job, "findById").mockResolvedValue(job);
        const save = vi.spyOn(job, "save").mockResolvedValue(job);

        const auth = authenticateAs(owner);
        const res = await request(app).put(`/api/jobs/${job._id}`).set("Authorization", auth).send({ title: "Senior Backend Engineer" });
        expect(res.status).toBe(200);
        expect(save).toHaveBeenCalledTimes(1);
        expect(res.body.title).toBe("Senior Backend Engineer");
        expect(res.body.skills).toEqual(["node", "mongodb"]);
        expect(res.body.job_type).toBe("full_time");
    });

    it("rejects fields that are not part of a job", async () => {
        const auth = authenticateAs(makeUser("employer"));
        const res = await request(app)
            .put("/api/jobs/64b7f0c2a1b2c3d4e5f60718")
            .set("Authorization", auth)
            .send({ application_count: 99 });
        expect(res.status).toBe(400);
        expect(res.body.message).toBe("Validation failed");
    });
});

describe("job moderation", () => {
    it("does not let the owner reopen a job an admin took down", async () => {
        const owner = makeUser("employer");
        const job = postedBy(owner);
        job.is_active = false;
        const lookup = vi.spyOn(Job, "findById").mockResolvedValue(job);
        const save = vi.spyOn(job, "save").mockResolvedValue(job);

        const res = await request(app).put(`/api/jobs/${job._id}`).set("Authorization", authenticateAs(owner)).send({ is_active: true });
        expect(res.status).toBe(400);
        expect(res.body.message).toBe("Validation failed");
        expect(lookup).not.toHaveBeenCalled();
        expect(save).not.toHaveBeenCalled();
        expect(job.is_active).toBe(false);
    });
});

describe("DELETE /api/jobs/:id", () => {
    it("removes the job together with its applications and bookmarks", async () => {
        const owner = makeUser("employer");
        const job = postedBy(owner);
        vi.spyOn(Job, "findById").mockResolvedValue(job);
        const dropApplications = vi.spyOn(Application, "deleteMany").mockResolvedValue({ acknowledged: true, deletedCount: 3 });
        const dropBookmarks = vi.spyOn(SavedJob, "deleteMany").mockResolvedValue({ acknowledged: true, deletedCount: 1 });
        const dropJob = vi.spyOn(Job, "deleteOne").mockResolvedValue({ acknowledged: true, deletedCount: 1 });

        const res = await request(app).delete(`/api/jobs/${job._id}`).set("Authorization", authenticateAs(owner));
        expect(res.status).toBe(200);
        expect(dropApplications).toHaveBeenCalledWith({ job_id: job._id });
        expect(dropBookmarks).toHaveBeenCalledWith({ job_id: job._id });
        expect(dropJob).toHaveBeenCalledWith({ _id: job._id });
    });
});
