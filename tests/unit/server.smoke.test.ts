import type { Server } from "http";
import { createServer } from "../../src/server";
import { createInMemoryAudit, createInMemoryJobStore, createInMemoryHousingRepo } from "../support/fakes";
import { createJobRunner } from "../../src/application/process-jobs/jobRunner";

describe("server smoke", () => {
  let server: Server;
  let baseUrl: string;
  let logSpy: jest.SpyInstance;

  beforeEach(async () => {
    logSpy = jest.spyOn(console, "log").mockImplementation(() => undefined);
    const jobs = createJobRunner({
      store: createInMemoryJobStore().store,
      audit: createInMemoryAudit().audit,
      config: { processingDelayMs: 0 },
      sleep: async () => undefined
    });
    server = createServer({ jobs, housing: createInMemoryHousingRepo().repo });
    await new Promise<void>((resolve) => server.listen(0, "127.0.0.1", resolve));
    const address = server.address();
    if (address === null || typeof address === "string") throw new Error("server is not listening on TCP");
    baseUrl = `http://127.0.0.1:${address.port}`;
  });

  afterEach(async () => {
    await new Promise<void>((resolve, reject) => server.close((err) => (err ? reject(err) : resolve())));
    logSpy.mockRestore();
  });

  it("responds with health payload and CORS headers", async () => {
    const res = await fetch(`${baseUrl}/health`);

    expect(res.status).toBe(200);
    expect(res.headers.get("content-type")).toBe("application/json");
    expect(res.headers.get("access-control-allow-origin")).toBe("*");
    await expect(res.json()).resolves.toMatchObject({ status: "healthy", service: "housing-jobs-service" });
  });

  it("answers preflight requests with 204", async () => {
    const res = await fetch(`${baseUrl}/api/process`, { method: "OPTIONS" });

    expect(res.status).toBe(204);
    expect(res.headers.get("access-control-allow-methods")).toBe("GET, POST, OPTIONS");
    await expect(res.text()).resolves.toBe("");
  });

  it("queues a job and serves its completed status", async () => {
    const submitted = await fetch(`${baseUrl}/api/process`, {
      method: "POST",
      headers: { "content-type": "application/json" },
      body: JSON.stringify({ data: "merhaba dünya" })
    });
    expect(submitted.status).toBe(202);
    const { job_id: jobId } = (await submitted.json()) as { job_id: string };

    let view: { status?: string; result?: { word_count?: number } } = {};
    for (let attempt = 0; attempt < 50 && view.status !== "completed"; attempt += 1) {
      await new Promise((r) => setTimeout(r, 10));
      const res = await fetch(`${baseUrl}/api/jobs/${jobId}`);
      view = (await res.json()) as typeof view;
    }

    expect(view.status).toBe("completed");
    expect(view.result?.word_count).toBe(2);
  });
});
