import { Throttle } from "./Throttle";

describe("Throttle", () => {
    it("never runs more than its capacity at once", async () => {
        const throttle = new Throttle(2);
        let running = 0;
        let peak = 0;
        const task = async (value: number) => {
            running++;
            peak = Math.max(peak, running);
            await new Promise((resolve) => setImmediate(resolve));
            running--;
            return value;
        };
        const results = await Promise.all(
            [1, 2, 3, 4, 5].map((value) =>
                throttle.withThrottle(() => task(value))
            )
        );
        expect(results).toEqual([1, 2, 3, 4, 5]);
        expect(peak).toBe(2);
    });

    it("frees its slot when a callback fails", async () => {
        const throttle = new Throttle(1);
        await expect(
            throttle.withThrottle(() => Promise.reject(new Error("boom")))
        ).rejects.toThrow("boom");
        await expect(throttle.withThrottle(async () => 7)).resolves.toBe(7);
    });

    it("queues callers beyond its capacity", async () => {
        const throttle = new Throttle(1);
        let release: () => void = () => undefined;
        let secondStarted = false;
        const first = throttle.withThrottle(
            () => new Promise<void>((resolve) => (release = resolve))
        );
        const second = throttle.withThrottle(async () => {
            secondStarted = true;
            return "second";
        });
        await new Promise((resolve) => setImmediate(resolve));
        expect(secondStarted).toBe(false);
        release();
        await first;
        await expect(second).resolves.toBe("second");
        expect(secondStarted).toBe(true);
    });

    it("rejects a capacity below one", () => {
        expect(() => new Throttle(0)).toThrow(RangeError);
    });
});
