import bcrypt from "bcryptjs";
import { config } from "../config/env";

// bcrypt ignores everything past 72 bytes
export const MAX_PASSWORD_BYTES = 72;

export const passwordProblem = (password: string): string | null => {
    if (Buffer.byteLength(password, "utf8") > MAX_PASSWORD_BYTES) {
        return "Password cannot be longer than 72 bytes";
    }
    if (password.length < 8 || !/[A-Z]/.test(password) || !/[0-9]/.test(password) || !/[!@#$%^&*(),.?":{}|<>]/.test(password)) {
        return "Password must be at least 8 characters with 1 uppercase letter, 1 number, and 1 special character";
    }
    return null;
};

export const hashPassword = async (password: string): Promise<string> => {
    const salt = await bcrypt.genSalt(config.saltRounds);
    return bcrypt.hash(password, salt);
};

export const verifyPassword = (password: string, hash: string): Promise<boolean> => bcrypt.compare(password, hash);
