import { describe, expect, test } from "vitest";
import { checkDefinitions, monitorKey, prepareJob } from "../../src/cli/context";
import type { HyperbakConfig } from "../../src/types";
import { FakeRunner } from "../helpers";

const config: HyperbakConfig = {
  version: "1.0",
  general: { hostname: "backup01", logLevel: "info" },
  hosts: {
    xen01: { server: "localhost" },
    xen02: { server: "10.0.0.6", username: "root", password: "test-secret" },
  },
  storage: {
    nas: { type: "local", path: "/srv/backups", retention: { type: "flat", count: 3 } },
    offsite: {
      type: "borg",
      repository: "/mnt/borg",
      encryption: "none",
      retention: { type: "flat", count: 3 },
    },
  },
  jobs: {
    nightly: {
      schedule: "0 2 * * *",
      timezone: "Europe/Vienna",
      hosts: ["xen02", "xen01"],
      storages: ["offsite", "nas"],
      tagFilter: ["backup"],
    },
    weekly: { schedule: "0 3 * * 0", hosts: ["xen01"], storages: ["nas"], tagFilter: ["archive"] },
  },
};

describe("CLI job wiring", () => {
  test("keys monitors by the machine running the job", () => {
    expect(monitorKey(config, "nightly")).toEqual({ hostname: "backup01", jobName: "nightly" });
  });

  test("describes one check per job", () => {
    expect(checkDefinitions(config, ["nightly", "weekly"])).toEqual([
      {
        key: { hostname: "backup01", jobName: "nightly" },
        schedule: "0 2 * * *",
        timezone: "Europe/Vienna",
      },
      { key: { hostname: "backup01", jobName: "weekly" }, schedule: "0 3 * * 0" },
    ]);
  });

  test("builds clients and backends in the order the job lists them", () => {
    const { definition, dependencies } = prepareJob(config, "nightly", new FakeRunner());

    expect(definition.name).toBe("nightly");
    expect(definition.hostname).toBe("backup01");
    expect(dependencies.hypervisors.map((client) => client.hostId)).toEqual(["xen02", "xen01"]);
    expect(dependencies.backends.map((backend) => `${backend.name}:${backend.type}`)).toEqual([
      "offsite:borg",
      "nas:local",
    ]);
  });

  test("rejects unknown jobs", () => {
    expect(() => prepareJob(config, "hourly")).toThrow('Job "hourly" not found');
  });
});
