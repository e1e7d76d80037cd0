import { describe, expect, test } from "vitest";
import { rejections, settleConcurrent } from "./concurrency";

const tick = () => new Promise<void>((resolve) => setTimeout(resolve, 1));

describe("settleConcurrent", () => {
    test("bounds the calls in flight and keeps input order", async () => {
        let active = 0;
        let peak = 0;
        const results = await settleConcurrent([1, 2, 3, 4, 5], 2, async (n) => {
            active++;
            peak = Math.max(peak, active);
            await tick();
            active--;
            if (n === 3) throw new Error("three");
            return n * 2;
        });

        expect(peak).toBe(2);
        expect(results.map((result) => result.status)).toEqual([
            "fulfilled",
            "fulfilled",
            "rejected",
            "fulfilled",
            "fulfilled",
        ]);
        expect(results[4]).toEqual({ status: "fulfilled", value: 10 });
        expect(rejections(results)).toEqual([new Error("three")]);
    });

    test("handles empty input", async () => {
        expect(await settleConcurrent([], 4, async () => 1)).toEqual([]);
    });
});
