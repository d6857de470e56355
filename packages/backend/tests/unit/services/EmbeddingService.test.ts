import { describe, expect, it, vi } from "vitest";
import { EmbeddingService } from "../../../src/services/EmbeddingService.js";
import { RequestRateLimiter } from "../../../src/services/RequestRateLimiter.js";
import { silentLogger } from "../../helpers/pipeline.js";

function createService(create: ReturnType<typeof vi.fn>, dimensions?: number): EmbeddingService {
  return new EmbeddingService(
    { apiKey: "test-key", model: "text-embedding-3-small", dimensions },
    {
      client: { embeddings: { create } },
      rateLimiter: new RequestRateLimiter({
        maxConcurrent: 5,
        maxRetries: 0,
        retryDelayMs: 1,
        requestsPerMinute: 200,
        timeoutMs: 5000
      }),
      logger: silentLogger
    }
  );
}

describe("EmbeddingService", () => {
  it("returns the first embedding of the response", async () => {
    const create = vi.fn().mockResolvedValue({ data: [{ embedding: [0.1, 0.2, 0.3] }] });
    const service = createService(create, 3);

    await expect(service.embed("  Acme Corporation ")).resolves.toEqual([0.1, 0.2, 0.3]);
    expect(create).toHaveBeenCalledWith({ model: "text-embedding-3-small", input: "Acme Corporation", dimensions: 3 });
  });

  it("skips the request for blank text", async () => {
    const create = vi.fn();
    const service = createService(create);

    await expect(service.embed("   ")).resolves.toBeNull();
    expect(create).not.toHaveBeenCalled();
  });

  it("returns null for malformed or empty responses", async () => {
    const create = vi
      .fn()
      .mockResolvedValueOnce({ data: [] })
      .mockResolvedValueOnce({ data: [{ embedding: "nope" }] })
      .mockResolvedValueOnce({ data: [{ embedding: [] }] });
    const service = createService(create);

    await expect(service.embed("a")).resolves.toBeNull();
    await expect(service.embed("b")).resolves.toBeNull();
    await expect(service.embed("c")).resolves.toBeNull();
  });

  it("returns null when the request fails", async () => {
    const create = vi.fn().mockRejectedValue(new Error("unauthorized"));
    const service = createService(create);

    await expect(service.embed("Acme")).resolves.toBeNull();
    await expect(service.healthCheck()).resolves.toBe(false);
  });
});
