import multer from "multer";
import { HttpError } from "./HttpError";

const RESUME_TYPES = [
    "application/pdf",
    "application/msword",
    "application/vnd.openxmlformats-officedocument.wordprocessingml.document",
];
const IMAGE_TYPES = ["image/png", "image/jpeg", "image/webp", "image/svg+xml"];

const storage = multer.memoryStorage();

const uploader = (allowed: string[], maxBytes: number, label: string) => multer({
    storage,
    limits: { fileSize: maxBytes },
    fileFilter: (_req, file, cb) => {
        if (allowed.includes(file.mimetype)) {
            cb(null, true);
        } else {
            cb(new HttpError(400, `Invalid file type. Please upload a valid ${label}`));
        }
    },
});

export const resumeUpload = uploader(RESUME_TYPES, 5 * 1024 * 1024, "resume (PDF or Word)");
export const imageUpload = uploader(IMAGE_TYPES, 2 * 1024 * 1024, "image");
