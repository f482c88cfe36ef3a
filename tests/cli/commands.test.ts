import { existsSync } from "node:fs";
import { mkdir, mkdtemp, readdir, rm, writeFile } from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";
import {
  afterAll,
  afterEach,
  beforeAll,
  beforeEach,
  describe,
  expect,
  type MockInstance,
  test,
  vi,
} from "vitest";
import { initStorageCommand } from "../../src/cli/commands/init-storage";
import { listCommand } from "../../src/cli/commands/list";
import { rotateCommand } from "../../src/cli/commands/rotate";

const WEB_NEW = "xen01__vm__web__2024-03-01T02:00:00+00:00.xva";
const WEB_OLD = "xen01__vm__web__2024-02-29T02:00:00+00:00.xva";
const DB = "xen02__vm__db__2024-02-28T02:00:00+00:00.xva";

function configYaml(storagePath: string): string {
  return `
version: "1.0"
general:
  hostname: backup01
  logLevel: error
hosts:
  xen01:
    server: localhost
  xen02:
    server: localhost
storage:
  local:
    type: local
    path: ${storagePath}
    retention:
      type: flat
      count: 1
jobs:
  nightly:
    schedule: "0 2 * * *"
    hosts: [xen01, xen02]
    storages: [local]
    tagFilter: [backup]
`;
}

describe("CLI commands", () => {
  let tempDir: string;
  let configPath: string;
  let backupDir: string;
  let consoleLogSpy: MockInstance<typeof console.log>;

  function printed(): string[] {
    return consoleLogSpy.mock.calls.map((call) => String(call[0]));
  }

  beforeAll(async () => {
    tempDir = await mkdtemp(path.join(os.tmpdir(), "hyperbak-cli-test-"));
    backupDir = path.join(tempDir, "backups");
    configPath = path.join(tempDir, "hyperbak.config.yaml");
    await writeFile(configPath, configYaml("./backups"));
  });

  afterAll(async () => {
    await rm(tempDir, { recursive: true, force: true });
  });

  beforeEach(async () => {
    consoleLogSpy = vi.spyOn(console, "log").mockImplementation(() => {});
    await rm(backupDir, { recursive: true, force: true });
    await mkdir(backupDir, { recursive: true });
    await writeFile(path.join(backupDir, WEB_NEW), "abc");
    await writeFile(path.join(backupDir, WEB_OLD), "abcd");
    await writeFile(path.join(backupDir, DB), "x");
    await writeFile(path.join(backupDir, "notes.txt"), "not a backup");
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe("init-storage", () => {
    test("creates the storage directory", async () => {
      const dir = await mkdtemp(path.join(tempDir, "init-"));
      const otherConfig = path.join(dir, "hyperbak.config.yaml");
      await writeFile(otherConfig, configYaml("./fresh/backups"));

      const code = await initStorageCommand(["-c", otherConfig]);

      expect(code).toBe(0);
      expect(existsSync(path.join(dir, "fresh", "backups"))).toBe(true);
    });

    test("fails for an unknown storage", async () => {
      expect(await initStorageCommand(["-c", configPath, "-s", "cloud"])).toBe(1);
    });
  });

  describe("list", () => {
    test("prints backups newest first as JSON", async () => {
      const code = await listCommand(["-c", configPath, "--format", "json"]);

      expect(code).toBe(0);
      expect(JSON.parse(printed().at(-1) ?? "")).toEqual([
        {
          storage: "local",
          hostId: "xen01",
          jobKind: "vm-backup",
          vm: "web",
          timestamp: "2024-03-01T02:00:00.000Z",
          compression: null,
          size: 3,
        },
        {
          storage: "local",
          hostId: "xen01",
          jobKind: "vm-backup",
          vm: "web",
          timestamp: "2024-02-29T02:00:00.000Z",
          compression: null,
          size: 4,
        },
        {
          storage: "local",
          hostId: "xen02",
          jobKind: "vm-backup",
          vm: "db",
          timestamp: "2024-02-28T02:00:00.000Z",
          compression: null,
          size: 1,
        },
      ]);
    });

    test("filters by VM and prints CSV", async () => {
      const code = await listCommand(["-c", configPath, "--vm", "db", "--format", "csv"]);

      expect(code).toBe(0);
      expect(printed().slice(-2)).toEqual([
        "storage,host_id,job_kind,vm,timestamp,compression,size_bytes",
        "local,xen02,vm-backup,db,2024-02-28T02:00:00+00:00,,1",
      ]);
    });

    test("rejects unknown formats", async () => {
      expect(await listCommand(["-c", configPath, "--format", "xml"])).toBe(1);
    });
  });

  describe("rotate", () => {
    test("changes nothing in a dry run", async () => {
      const code = await rotateCommand(["-c", configPath, "--dry-run"]);

      expect(code).toBe(0);
      expect(await readdir(backupDir)).toHaveLength(4);
    });

    test("deletes what the retention policy drops", async () => {
      const code = await rotateCommand(["-c", configPath, "--force"]);

      expect(code).toBe(0);
      expect((await readdir(backupDir)).sort()).toEqual([WEB_NEW, "notes.txt", DB].sort());
    });
  });
});
