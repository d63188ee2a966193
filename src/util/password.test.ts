import { describe, expect, it } from "vitest";
import { hashPassword, passwordProblem, verifyPassword } from "./password";

const STRENGTH = "Password must be at least 8 characters with 1 uppercase letter, 1 number, and 1 special character";

describe("passwordProblem", () => {
    it("accepts a strong password", () => {
        expect(passwordProblem("Sunny-day7")).toBeNull();
    });

    it("requires length, an uppercase letter, a digit and a special character", () => {
        expect(passwordProblem("Ab1!")).toBe(STRENGTH);
        expect(passwordProblem("sunny-day7")).toBe(STRENGTH);
        expect(passwordProblem("Sunny-dayy")).toBe(STRENGTH);
        expect(passwordProblem("Sunnyday77")).toBe(STRENGTH);
    });

    it("rejects passwords over 72 bytes", () => {
        expect(passwordProblem(`A1!${"é".repeat(35)}`)).toBe("Password cannot be longer than 72 bytes");
    });
});

describe("hashPassword", () => {
    it("produces a hash that verifies only the original password", async () => {
        const hash = await hashPassword("Sunny-day7");
        expect(hash).not.toBe("Sunny-day7");
        expect(await verifyPassword("Sunny-day7", hash)).toBe(true);
        expect(await verifyPassword("Sunny-day8", hash)).toBe(false);
    });
});
