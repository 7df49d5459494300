import { http, HttpResponse } from "msw";
import { describe, expect, it } from "vitest";
import { collectIssueJobs, listPolicyJobs, replayNotifications, summarizeTargetJobs } from "../../lib/commands";
import { NotFoundError, ZeroNorthConfigError } from "../../lib/infrastructure/zeronorth/errors";
import { server } from "../setup";
import { apiUrl, createMemoryLogger, createTestServices, listBody, resource } from "../helpers/zeronorth";

function serveAccount(name = "Acme") {
  server.use(http.get(apiUrl("/accounts/me"), () => HttpResponse.json({ customer: { data: { name } } })));
}

function job(id: string, status: string, created?: string, lastModified?: string) {
  return created ? { id, data: { status }, meta: { created, lastModified } } : { id, data: { status } };
}

describe("listPolicyJobs", () => {
  it("should list the jobs oldest first with their duration in minutes", async () => {
    let query: URLSearchParams | undefined;
    server.use(
      http.get(apiUrl("/policies/:id"), () => HttpResponse.json(resource("p-1", { name: "web-upload" }))),
      http.get(apiUrl("/jobs"), ({ request }) => {
        query = new URL(request.url).searchParams;
        return HttpResponse.json(
          listBody([
            job("j-2", "FINISHED", "2024-02-01T10:00:00.000Z", "2024-02-01T10:30:00.000Z"),
            job("j-1", "FAILED", "2024-01-15T08:00:00.000Z", "2024-01-15T08:01:30.000Z"),
            job("j-3", "PENDING"),
          ]),
        );
      }),
    );
    const { services } = createTestServices();

    const lines = await listPolicyJobs(services, "p-1", "2024-01-01");

    expect(lines).toEqual([
      "date,jobId,status,start,end,dur.(mins)",
      ",j-3,PENDING,,,",
      "2024-01-15,j-1,FAILED,2024-01-15 08:00:00,2024-01-15 08:01:30,1.5",
      "2024-02-01,j-2,FINISHED,2024-02-01 10:00:00,2024-02-01 10:30:00,30",
    ]);
    expect(query?.get("policyId")).toBe("p-1");
    expect(query?.get("since")).toBe("2024-01-01");
    expect(query?.get("limit")).toBe("1000");
  });

  it("should require the policy to exist", async () => {
    server.use(
      http.get(apiUrl("/policies/:id"), () =>
        HttpResponse.json({ statusCode: 404, message: "Not found" }, { status: 404 }),
      ),
    );
    const { services } = createTestServices();

    await expect(listPolicyJobs(services, "p-9", "2024-01-01")).rejects.toThrow(new NotFoundError("Policy", "p-9"));
  });
});

describe("summarizeTargetJobs", () => {
  it("should count finished jobs per target and policy", async () => {
    serveAccount();
    const jobLimits: string[] = [];
    server.use(
      http.get(apiUrl("/targets"), () =>
        HttpResponse.json(listBody([resource("t-1", { name: "web" }), resource("t-2", { name: "api, v2" })])),
      ),
      http.get(apiUrl("/policies"), ({ request }) => {
        const targetId = new URL(request.url).searchParams.get("targetId");
        const policies =
          targetId === "t-1" ? [resource("p-1", { name: "web-upload" }), resource("p-2", { name: "web-scan" })] : [];
        return HttpResponse.json(listBody(policies));
      }),
      http.get(apiUrl("/jobs"), ({ request }) => {
        const params = new URL(request.url).searchParams;
        jobLimits.push(params.get("limit") ?? "");
        const jobs =
          params.get("policyId") === "p-1"
            ? [job("j-1", "FINISHED"), job("j-2", "FAILED"), job("j-3", "FINISHED")]
            : [job("j-4", "RUNNING")];
        return HttpResponse.json(listBody(jobs));
      }),
    );
    const { services } = createTestServices();

    const lines = await summarizeTargetJobs(services);

    expect(lines).toEqual(["target_name,policy_name,jobs", "web,web-upload,2", "web,web-scan,0", '"api, v2",,']);
    expect(jobLimits).toEqual(["10", "10"]);
  });
});

describe("collectIssueJobs", () => {
  it("should keep the distinct jobs of open issues, oldest first", () => {
    const jobs = collectIssueJobs([
      {
        id: "i-1",
        data: {
          status: "Open",
          ignore: false,
          issueJobs: [
            { jobId: "j-2", runTime: 1700000000 },
            { jobId: "j-1", runTime: 1690000000 },
          ],
        },
      },
      { id: "i-2", data: { status: "Remediation", ignore: false, issueJobs: [{ jobId: "j-8", runTime: 1 }] } },
      { id: "i-3", data: { status: "Open", ignore: true, issueJobs: [{ jobId: "j-9", runTime: 2 }] } },
      { id: "i-4", data: { status: "Open", issueJobs: [{ jobId: "j-10", runTime: 3 }] } },
      { id: "i-5", data: { status: "Open", ignore: false, issueJobs: [{ jobId: "j-2", runTime: 1700000000 }] } },
      { id: "i-6" },
    ]);

    expect(jobs).toEqual([
      { date: "2023-07-22T04:26:40Z", jobId: "j-1" },
      { date: "2023-11-14T22:13:20Z", jobId: "j-2" },
    ]);
  });
});

describe("replayNotifications", () => {
  const input = {
    customerId: "c-1",
    customerName: "Acme",
    targetId: "t-1",
    targetName: "web",
    replayToken: "replay-secret",
  };

  function serveIssues(issueQuery: URLSearchParams[] = []) {
    serveAccount();
    server.use(
      http.get(apiUrl("/targets/:id"), () => HttpResponse.json(resource("t-1", { name: "web" }))),
      http.get(apiUrl("/syntheticIssues"), ({ request }) => {
        issueQuery.push(new URL(request.url).searchParams);
        return HttpResponse.json(
          listBody([
            {
              id: "i-1",
              data: {
                status: "Open",
                ignore: false,
                issueJobs: [
                  { jobId: "j-1", runTime: 1690000000 },
                  { jobId: "j-2", runTime: 1700000000 },
                ],
              },
            },
          ]),
        );
      }),
    );
  }

  it("should replay each job with the replay token and continue past failures", async () => {
    serveIssues();
    const replays: Array<{ authorization: string | null; body: unknown }> = [];
    server.use(
      http.post(apiUrl("/jobs/replay-notifications"), async ({ request }) => {
        const body = await request.json();
        replays.push({ authorization: request.headers.get("authorization"), body });
        return replays.length === 1
          ? new HttpResponse(null, { status: 200 })
          : HttpResponse.json({ statusCode: 403, message: "Forbidden" }, { status: 403 });
      }),
    );
    const { logger, lines } = createMemoryLogger();
    const { services, sleep } = createTestServices({}, { logger });

    const result = await replayNotifications(services, input);

    expect(result).toMatchObject({ replayed: 1, failed: 1 });
    expect(replays).toEqual([
      { authorization: "replay-secret", body: { customerId: "c-1", jobId: "j-1" } },
      { authorization: "replay-secret", body: { customerId: "c-1", jobId: "j-2" } },
    ]);
    expect(sleep.mock.calls).toEqual([[5000], [5000]]);
    expect(lines).toContain(
      "WARN Problem processing job 'j-2', continuing: Forbidden (HTTP 403) with message:\n" +
        '{"statusCode":403,"message":"Forbidden"}',
    );
  });

  it("should only list the jobs on a dry run", async () => {
    const issueQuery: URLSearchParams[] = [];
    serveIssues(issueQuery);
    const { services } = createTestServices();

    const result = await replayNotifications(services, { ...input, dryRun: true, pauseMs: 0 });

    expect(result).toEqual({
      jobs: [
        { date: "2023-07-22T04:26:40Z", jobId: "j-1" },
        { date: "2023-11-14T22:13:20Z", jobId: "j-2" },
      ],
      replayed: 0,
      failed: 0,
    });
    expect(issueQuery[0].get("targetId")).toBe("t-1");
    expect(issueQuery[0].get("limit")).toBe("1000");
  });

  it("should refuse a target name that does not match", async () => {
    serveIssues();
    const { services } = createTestServices();

    await expect(replayNotifications(services, { ...input, targetName: "Web" })).rejects.toThrow(
      new ZeroNorthConfigError("Target name 'web' does not match the specified Target name 'Web'"),
    );
  });

  it("should refuse a customer name that does not match", async () => {
    serveAccount("Other");
    const { services } = createTestServices();

    await expect(replayNotifications(services, input)).rejects.toThrow(
      new ZeroNorthConfigError("Customer name 'Other' does not match the specified customer name 'Acme'"),
    );
  });
});
