import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { http, HttpResponse } from "msw";
import { describe, expect, it, beforeAll, afterAll } from "vitest";
import { failJob, runPolicy, uploadIssues } from "../../lib/commands";
import { NotFoundError, ZeroNorthConfigError } from "../../lib/infrastructure/zeronorth/errors";
import { server } from "../setup";
import { apiUrl, createMemoryLogger, createTestServices, listBody, resource } from "../helpers/zeronorth";

function serveJobFlow(finalStatus: string, calls: string[]) {
  let checks = 0;
  server.use(
    http.post(apiUrl("/policies/:policyId/run"), ({ params }) => {
      calls.push(`run ${String(params.policyId)}`);
      return HttpResponse.json({ jobId: "j-1" });
    }),
    http.post(apiUrl("/onprem/issues/:jobId"), () => {
      calls.push("upload");
      return HttpResponse.json({});
    }),
    http.post(apiUrl("/jobs/:jobId/resume"), () => {
      calls.push("resume");
      return HttpResponse.json({});
    }),
    http.get(apiUrl("/jobs/:jobId"), ({ params }) => {
      checks++;
      const status = checks < 2 ? "RUNNING" : finalStatus;
      calls.push(`status ${status}`);
      return HttpResponse.json({ id: String(params.jobId), data: { status } });
    }),
  );
}

describe("job commands", () => {
  let tempDir = "";
  let issuesFile = "";

  beforeAll(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), "zn-job-commands-"));
    issuesFile = path.join(tempDir, "scan.json");
    fs.writeFileSync(issuesFile, "{}");
  });

  afterAll(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  describe("uploadIssues", () => {
    it("should run the upload flow and report the final status", async () => {
      const calls: string[] = [];
      serveJobFlow("FINISHED", calls);
      server.use(
        http.get(apiUrl("/policies/:id"), () =>
          HttpResponse.json(resource("p-1", { name: "web-upload", policyType: "manualUpload" })),
        ),
      );
      const { services } = createTestServices();

      const outcome = await uploadIssues(services, { policyId: "p-1", filePath: issuesFile });

      expect(outcome).toEqual({ jobId: "j-1", status: "FINISHED", waited: true });
      expect(calls).toEqual(["run p-1", "upload", "resume", "status RUNNING", "status FINISHED"]);
    });

    it("should warn about a policy that is not a manual upload", async () => {
      serveJobFlow("FAILED", []);
      server.use(
        http.get(apiUrl("/policies/:id"), () =>
          HttpResponse.json(resource("p-1", { name: "nightly", policyType: "scheduled" })),
        ),
      );
      const { logger, lines } = createMemoryLogger();
      const { services } = createTestServices({}, { logger });

      const outcome = await uploadIssues(services, { policyId: "p-1", filePath: issuesFile });

      expect(outcome.status).toBe("FAILED");
      expect(lines).toContain("WARN Policy 'p-1' has type 'scheduled', expected 'manualUpload'.");
    });

    it("should refuse a missing file before starting a job", async () => {
      const { services } = createTestServices();

      await expect(
        uploadIssues(services, { policyId: "p-1", filePath: path.join(tempDir, "missing.json") }),
      ).rejects.toBeInstanceOf(ZeroNorthConfigError);
    });

    it("should refuse an unknown policy", async () => {
      server.use(
        http.get(apiUrl("/policies/:id"), () =>
          HttpResponse.json({ statusCode: 404, message: "Not found" }, { status: 404 }),
        ),
      );
      const { services } = createTestServices();

      await expect(uploadIssues(services, { policyId: "p-404", filePath: issuesFile })).rejects.toThrow(
        new NotFoundError("Policy", "p-404"),
      );
    });
  });

  describe("runPolicy", () => {
    it("should resolve a policy name and wait for the job", async () => {
      const calls: string[] = [];
      serveJobFlow("FINISHED", calls);
      server.use(
        http.get(apiUrl("/policies/:id"), () =>
          HttpResponse.json({ statusCode: 404, message: "Not found" }, { status: 404 }),
        ),
        http.get(apiUrl("/policies/"), () => HttpResponse.json(listBody([resource("p-7", { name: "Nightly" })]))),
      );
      const { services, sleep } = createTestServices();

      const outcome = await runPolicy(services, { policy: "nightly" });

      expect(outcome).toEqual({ jobId: "j-1", status: "FINISHED", waited: true });
      expect(calls).toEqual(["run p-7", "status RUNNING", "status FINISHED"]);
      expect(sleep).toHaveBeenCalledWith(10000, undefined);
    });

    it("should not wait when asked not to", async () => {
      const calls: string[] = [];
      serveJobFlow("FINISHED", calls);
      server.use(http.get(apiUrl("/policies/:id"), () => HttpResponse.json(resource("p-1", { name: "Nightly" }))));
      const { services } = createTestServices();

      const outcome = await runPolicy(services, { policy: "p-1", wait: false });

      expect(outcome).toEqual({ jobId: "j-1", waited: false });
      expect(calls).toEqual(["run p-1"]);
    });
  });

  describe("failJob", () => {
    it("should fail the job and report its new status", async () => {
      let status = "RUNNING";
      server.use(
        http.get(apiUrl("/jobs/:jobId"), ({ params }) =>
          HttpResponse.json({ id: String(params.jobId), data: { status } }),
        ),
        http.post(apiUrl("/jobs/:jobId/fail"), () => {
          status = "FAILED";
          return HttpResponse.json({});
        }),
      );
      const { services } = createTestServices();

      await expect(failJob(services, "j-1")).resolves.toEqual({
        jobId: "j-1",
        previousStatus: "RUNNING",
        status: "FAILED",
      });
    });
  });
});
