import { describe, expect, it } from "vitest";
import { fiberKoid, flatId, ringKoid } from "../src/core/trace/koid";

describe("koids", () => {
    it("tags ring and fiber ids in the low bits", () => {
        expect(ringKoid(0)).toBe(1n);
        expect(fiberKoid(0)).toBe(2n);
        expect(ringKoid(3)).toBe(13n);
        expect(fiberKoid(7)).toBe(30n);
        expect(flatId(1, "fiber")).toBe(fiberKoid(1));
    });

    it("never maps a ring and a fiber to the same koid", () => {
        const rings = new Set<bigint>();
        for (let i = 0; i <= 10_000; i++) rings.add(ringKoid(i));
        for (let i = 0; i <= 10_000; i++) expect(rings.has(fiberKoid(i))).toBe(false);
        expect(rings.size).toBe(10_001);
    });

    it("keeps ids above 2^53 exact", () => {
        expect(fiberKoid(Number.MAX_SAFE_INTEGER)).toBe((BigInt(Number.MAX_SAFE_INTEGER) << 2n) | 2n);
    });
});
