import { describe, it, expect } from "vitest";
import { MemoryRateLimiter } from "../src/services/rateLimit";

describe("MemoryRateLimiter", () => {
  it("allows up to the limit inside the window", async () => {
    let now = 0;
    const limiter = new MemoryRateLimiter(2, 60_000, () => now);

    await expect(limiter.check("1.2.3.4")).resolves.toEqual({ allowed: true, remaining: 1 });
    now = 10;
    await expect(limiter.check("1.2.3.4")).resolves.toEqual({ allowed: true, remaining: 0 });
    now = 20;
    await expect(limiter.check("1.2.3.4")).resolves.toEqual({ allowed: false, remaining: 0 });
  });

  it("frees a slot once the oldest hit leaves the window", async () => {
    let now = 0;
    const limiter = new MemoryRateLimiter(2, 1_000, () => now);

    await limiter.check("ip");
    now = 500;
    await limiter.check("ip");
    now = 1_000;
    await expect(limiter.check("ip")).resolves.toEqual({ allowed: true, remaining: 0 });
    now = 1_200;
    await expect(limiter.check("ip")).resolves.toEqual({ allowed: false, remaining: 0 });
  });

  it("counts keys separately", async () => {
    const limiter = new MemoryRateLimiter(1, 60_000, () => 0);

    await expect(limiter.check("a")).resolves.toEqual({ allowed: true, remaining: 0 });
    await expect(limiter.check("b")).resolves.toEqual({ allowed: true, remaining: 0 });
  });
});
