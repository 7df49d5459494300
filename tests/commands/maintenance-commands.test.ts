import { http, HttpResponse } from "msw";
import { describe, expect, it } from "vitest";
import {
  addSecret,
  cleanOnPremJobs,
  deleteAllSchedules,
  deleteOrphanSchedules,
  deleteSecret,
  getSecret,
} from "../../lib/commands";
import { NotFoundError, ZeroNorthConfigError } from "../../lib/infrastructure/zeronorth/errors";
import { server } from "../setup";
import { apiUrl, createMemoryLogger, createTestServices, listBody, resource } from "../helpers/zeronorth";

function withoutDebug(lines: string[]): string[] {
  return lines.filter((line) => !line.startsWith("DEBUG"));
}

function serveAccount(name = "Acme") {
  server.use(http.get(apiUrl("/accounts/me"), () => HttpResponse.json({ customer: { data: { name } } })));
}

describe("secrets", () => {
  it("should create a usernamePassword secret and return its key", async () => {
    serveAccount();
    let created: unknown;
    server.use(
      http.post(apiUrl("/secrets"), async ({ request }) => {
        created = await request.json();
        return HttpResponse.json({ key: "k-1" });
      }),
    );
    const { services } = createTestServices();

    const key = await addSecret(services, { username: "svc", password: "test-secret" });

    expect(key).toBe("k-1");
    expect(created).toEqual({
      type: "usernamePassword",
      secret: { username: "svc", password: "test-secret" },
      description: "Added by zn-secret-username-password",
    });
  });

  it("should require both a username and a password", async () => {
    const { services } = createTestServices();

    await expect(addSecret(services, { username: "svc", password: "" })).rejects.toThrow(
      new ZeroNorthConfigError("Both a username and a password are required"),
    );
  });

  it("should read a secret back as username:password", async () => {
    serveAccount();
    server.use(
      http.get(apiUrl("/secrets/:key"), ({ params }) =>
        HttpResponse.json({
          key: String(params.key),
          data: { type: "usernamePassword", secret: { username: "svc", password: "test-secret" } },
        }),
      ),
    );
    const { services } = createTestServices();

    await expect(getSecret(services, "k-1")).resolves.toBe("svc:test-secret");
  });

  it("should report an unknown key", async () => {
    serveAccount();
    server.use(
      http.get(apiUrl("/secrets/:key"), () =>
        HttpResponse.json({ statusCode: 404, message: "Not found" }, { status: 404 }),
      ),
    );
    const { services } = createTestServices();

    await expect(getSecret(services, "k-9")).rejects.toThrow(new NotFoundError("Secret", "k-9"));
  });

  it("should delete a secret and accept an empty answer", async () => {
    serveAccount();
    const deleted: string[] = [];
    server.use(
      http.delete(apiUrl("/secrets/:key"), ({ params }) => {
        deleted.push(String(params.key));
        return new HttpResponse(null, { status: 200 });
      }),
    );
    const { logger, lines } = createMemoryLogger();
    const { services } = createTestServices({}, { logger });

    await deleteSecret(services, "k-1");

    expect(deleted).toEqual(["k-1"]);
    expect(withoutDebug(lines)).toEqual(["INFO Customer: 'Acme'", "INFO Secret deleted."]);
  });
});

/**
 * Policies with their schedules; DELETE records "policy/schedule etag" and
 * answers 500 for schedule IDs listed in `failing`
 */
function serveSchedules(
  policies: Array<{ id: string; name: string; schedules: string[] }>,
  deletes: string[],
  failing: string[] = [],
) {
  server.use(
    http.get(apiUrl("/policies"), () =>
      HttpResponse.json(listBody(policies.map((policy) => resource(policy.id, { name: policy.name })))),
    ),
    http.get(apiUrl("/policies/:policyId/schedules"), ({ params }) => {
      const policy = policies.find((candidate) => candidate.id === params.policyId);
      const schedules = (policy?.schedules ?? []).map((id) => ({
        id,
        data: { policyId: String(params.policyId) },
        meta: { etag: `etag-${id}` },
      }));
      return HttpResponse.json(listBody(schedules));
    }),
    http.delete(apiUrl("/policies/:policyId/schedules/:scheduleId"), ({ params, request }) => {
      const scheduleId = String(params.scheduleId);
      if (failing.includes(scheduleId)) {
        return HttpResponse.json({ statusCode: 500, message: "Boom" }, { status: 500 });
      }
      deletes.push(`${String(params.policyId)}/${scheduleId} ${request.headers.get("etag") ?? ""}`);
      return new HttpResponse(null, { status: 200 });
    }),
  );
}

describe("deleteAllSchedules", () => {
  const policies = [
    { id: "p-1", name: "web-upload", schedules: ["s-1", "s-2"] },
    { id: "p-2", name: "nightly", schedules: ["s-3"] },
    { id: "p-3", name: "unscheduled", schedules: [] },
  ];

  it("should delete every schedule with its etag", async () => {
    serveAccount();
    const deletes: string[] = [];
    serveSchedules(policies, deletes);
    const { services } = createTestServices();

    const result = await deleteAllSchedules(services, { customerName: "Acme" });

    expect(result.deleted).toBe(3);
    expect(result.failed).toBe(0);
    expect(result.schedules.map((schedule) => `${schedule.policyName}:${schedule.scheduleId}`)).toEqual([
      "web-upload:s-1",
      "web-upload:s-2",
      "nightly:s-3",
    ]);
    expect(deletes).toEqual(["p-1/s-1 etag-s-1", "p-1/s-2 etag-s-2", "p-2/s-3 etag-s-3"]);
  });

  it("should refuse a customer name that differs in case", async () => {
    serveAccount();
    const { services } = createTestServices();

    await expect(deleteAllSchedules(services, { customerName: "acme" })).rejects.toThrow(
      new ZeroNorthConfigError("Customer name 'Acme' does not match the specified customer name 'acme'"),
    );
  });

  it("should only list the schedules on a dry run", async () => {
    serveAccount();
    const deletes: string[] = [];
    serveSchedules(policies, deletes);
    const { services } = createTestServices();

    const result = await deleteAllSchedules(services, { customerName: "Acme", dryRun: true });

    expect(result).toMatchObject({ deleted: 0, failed: 0 });
    expect(result.schedules).toHaveLength(3);
    expect(deletes).toEqual([]);
  });

  it("should stop when the deletion is not confirmed", async () => {
    serveAccount();
    const deletes: string[] = [];
    serveSchedules(policies, deletes);
    const { services } = createTestServices();
    const offered: number[] = [];

    await expect(
      deleteAllSchedules(services, {
        customerName: "Acme",
        confirm: async (schedules) => {
          offered.push(schedules.length);
          return false;
        },
      }),
    ).rejects.toThrow(new ZeroNorthConfigError("Schedule deletion was not confirmed"));
    expect(offered).toEqual([3]);
    expect(deletes).toEqual([]);
  });

  it("should warn about a failed deletion and continue", async () => {
    serveAccount();
    const deletes: string[] = [];
    serveSchedules(policies, deletes, ["s-2"]);
    const { logger, lines } = createMemoryLogger();
    const { services } = createTestServices({}, { logger });

    const result = await deleteAllSchedules(services, { customerName: "Acme", confirm: async () => true });

    expect(result).toMatchObject({ deleted: 2, failed: 1 });
    expect(deletes).toEqual(["p-1/s-1 etag-s-1", "p-2/s-3 etag-s-3"]);
    expect(lines).toContain(
      'WARN Problem deleting schedule s-2, continuing: Boom (HTTP 500) with message:\n{"statusCode":500,"message":"Boom"}',
    );
  });
});

describe("deleteOrphanSchedules", () => {
  it("should refuse while the policy still exists", async () => {
    server.use(http.get(apiUrl("/policies/:id"), () => HttpResponse.json(resource("p-1", { name: "web-upload" }))));
    const { services } = createTestServices();

    await expect(deleteOrphanSchedules(services, "p-1")).rejects.toThrow(
      new ZeroNorthConfigError("Policy with ID 'p-1' still exists"),
    );
  });

  it("should delete the schedules of a deleted policy", async () => {
    const deletes: string[] = [];
    serveSchedules([{ id: "p-9", name: "gone", schedules: ["s-7"] }], deletes);
    server.use(
      http.get(apiUrl("/policies/:id"), () =>
        HttpResponse.json({ statusCode: 404, message: "Not found" }, { status: 404 }),
      ),
    );
    const { services } = createTestServices();

    const result = await deleteOrphanSchedules(services, "p-9");

    expect(result).toEqual({
      schedules: [{ policyId: "p-9", policyName: "p-9", scheduleId: "s-7", etag: "etag-s-7" }],
      deleted: 1,
      failed: 0,
    });
    expect(deletes).toEqual(["p-9/s-7 etag-s-7"]);
  });
});

describe("cleanOnPremJobs", () => {
  /**
   * Queue of job IDs; failing a job takes it off the queue
   */
  function serveQueue(queue: string[], failed: string[]) {
    server.use(
      http.get(apiUrl("/onprem/jobs"), () =>
        HttpResponse.json(queue.length > 0 ? [{ payload: { jobId: queue[0] } }] : []),
      ),
      http.post(apiUrl("/jobs/:jobId/fail"), ({ params }) => {
        const jobId = String(params.jobId);
        failed.push(jobId);
        const index = queue.indexOf(jobId);
        if (index >= 0) {
          queue.splice(index, 1);
        }
        return new HttpResponse(null, { status: 200 });
      }),
    );
  }

  it("should fail queued jobs until the queue is empty", async () => {
    const failed: string[] = [];
    serveQueue(["j-1", "j-2"], failed);
    const { logger, lines } = createMemoryLogger();
    const { services } = createTestServices({}, { logger });

    const cleaned = await cleanOnPremJobs(services, 5);

    expect(cleaned).toEqual(["j-1", "j-2"]);
    expect(failed).toEqual(["j-1", "j-2"]);
    expect(lines[lines.length - 1]).toBe("INFO 2 jobs removed from the on-prem jobs queue.");
  });

  it("should stop at the maximum", async () => {
    const failed: string[] = [];
    serveQueue(["j-1", "j-2", "j-3"], failed);
    const { services } = createTestServices();

    await expect(cleanOnPremJobs(services, 2)).resolves.toEqual(["j-1", "j-2"]);
    expect(failed).toEqual(["j-1", "j-2"]);
  });

  it("should do nothing for an empty queue", async () => {
    serveQueue([], []);
    const { logger, lines } = createMemoryLogger();
    const { services } = createTestServices({}, { logger });

    await expect(cleanOnPremJobs(services, 3)).resolves.toEqual([]);
    expect(withoutDebug(lines)).toEqual(["INFO 0 jobs removed from the on-prem jobs queue."]);
  });

  it("should fail the PENDING job of a deleted policy", async () => {
    const failed: string[] = [];
    let orphaned = true;
    let policyFilter: string | null = null;
    server.use(
      http.get(apiUrl("/onprem/jobs"), () =>
        orphaned
          ? HttpResponse.json(
              { statusCode: 404, message: "Resource with id: 'p-9' does not exist" },
              { status: 404 },
            )
          : HttpResponse.json([]),
      ),
      http.get(apiUrl("/jobs"), ({ request }) => {
        policyFilter = new URL(request.url).searchParams.get("policyId");
        return HttpResponse.json(
          listBody([
            { id: "j-7", data: { status: "FINISHED" } },
            { id: "j-8", data: { status: "PENDING" } },
          ]),
        );
      }),
      http.post(apiUrl("/jobs/:jobId/fail"), ({ params }) => {
        failed.push(String(params.jobId));
        orphaned = false;
        return HttpResponse.json({ id: String(params.jobId) });
      }),
    );
    const { logger, lines } = createMemoryLogger();
    const { services } = createTestServices({}, { logger });

    const cleaned = await cleanOnPremJobs(services, 5);

    expect(cleaned).toEqual(["j-8"]);
    expect(failed).toEqual(["j-8"]);
    expect(policyFilter).toBe("p-9");
    expect(lines[lines.length - 1]).toBe("INFO 1 job removed from the on-prem jobs queue.");
  });

  it("should stop when a deleted policy has no PENDING job", async () => {
    server.use(
      http.get(apiUrl("/onprem/jobs"), () =>
        HttpResponse.json({ statusCode: 404, message: "Resource with id: 'p-9' does not exist" }, { status: 404 }),
      ),
      http.get(apiUrl("/jobs"), () => HttpResponse.json(listBody([{ id: "j-7", data: { status: "FINISHED" } }]))),
    );
    const { logger, lines } = createMemoryLogger();
    const { services } = createTestServices({}, { logger });

    await expect(cleanOnPremJobs(services, 5)).resolves.toEqual([]);
    expect(lines).toContain("WARN Can't find the PENDING job of that Policy.");
  });

  it("should reject a negative maximum", async () => {
    const { services } = createTestServices();

    await expect(cleanOnPremJobs(services, -1)).rejects.toBeInstanceOf(ZeroNorthConfigError);
  });
});
