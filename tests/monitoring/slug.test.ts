import { describe, expect, test } from "vitest";
import { assertDistinctSlugs, renderMonitorSlug } from "../../src/monitoring/slug";

describe("renderMonitorSlug", () => {
  test("joins job and host", () => {
    expect(renderMonitorSlug({ jobName: "nightly", hostname: "backup01" })).toBe("nightly_backup01");
  });

  test("lower-cases and collapses other characters to a dash", () => {
    expect(renderMonitorSlug({ jobName: "Nightly VMs!", hostname: "Backup.Example.COM" })).toBe(
      "nightly-vms_backup-example-com",
    );
  });

  test("trims leading and trailing dashes", () => {
    expect(renderMonitorSlug({ jobName: "  weekly  ", hostname: "_host_" })).toBe("weekly_host");
  });
});

describe("assertDistinctSlugs", () => {
  test("accepts distinct keys", () => {
    expect(() =>
      assertDistinctSlugs([
        { jobName: "nightly", hostname: "backup01" },
        { jobName: "weekly", hostname: "backup01" },
      ]),
    ).not.toThrow();
  });

  test("accepts the same key twice", () => {
    const key = { jobName: "nightly", hostname: "backup01" };

    expect(() => assertDistinctSlugs([key, { ...key }])).not.toThrow();
  });

  test("rejects keys that render to the same slug", () => {
    expect(() =>
      assertDistinctSlugs([
        { jobName: "daily vms", hostname: "backup01" },
        { jobName: "daily-vms", hostname: "backup01" },
      ]),
    ).toThrow('share the monitor slug "daily-vms_backup01"');
  });
});
