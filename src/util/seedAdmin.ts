import User from "../models/User";
import { config } from "../config/env";
import { hashPassword } from "./password";

export const seedAdmin = async (): Promise<void> => {
    const existing = await User.findOne({ role: "admin" });
    if (existing) {
        console.log("Admin user already exists");
        return;
    }
    if (!config.admin.password) {
        console.log("ADMIN_PASSWORD is not set, skipping admin seeding");
        return;
    }
    await User.create({
        email: config.admin.email,
        full_name: "Administrator",
        hashed_password: await hashPassword(config.admin.password),
        role: "admin",
        is_verified: true,
    });
    console.log("Admin user created successfully");
};
