import jwt from "jsonwebtoken";
import { vi } from "vitest";
import User, { UserDocument, UserRole } from "../models/User";

export const makeUser = (role: UserRole, overrides: { email?: string; is_active?: boolean } = {}): UserDocument =>
    new User({
        email: overrides.email ?? `${role}@example.com`,
        full_name: `Test ${role}`,
        role,
        hashed_password: "not-a-real-hash",
        is_verified: true,
        is_active: overrides.is_active ?? true,
    });

export const tokenFor = (user: UserDocument): string =>
    jwt.sign({ id: user._id.toString(), role: user.role }, "test-secret", { expiresIn: 60 });

// authMiddleware resolves the caller through User.findById
export const authenticateAs = (user: UserDocument) => {
    vi.spyOn(User, "findById").mockResolvedValue(user);
    return `Bearer ${tokenFor(user)}`;
};
