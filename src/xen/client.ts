/**
 * Xen hypervisor client wrapping the `xe` CLI
 */

import type { ExportStreams, HostConfig, HypervisorClient, VmHandle } from "../types";
import { CollaboratorError, NoSnapshotsError } from "../utils/errors";
import type { ScopedLogger } from "../utils/logger";
import { scoped } from "../utils/logger";
import type { CommandResult, CommandRunner } from "../utils/process";
import { defaultRunner, describeCommand } from "../utils/process";
import { parseUuidList, parseVm } from "./parser";

const XE = "xe";

const VM_LIST_FILTERS = ["is-a-template=false", "is-a-snapshot=false", "is-control-domain=false"];

function isLocal(server: string): boolean {
  return server === "localhost" || server === "127.0.0.1";
}

export class XenClient implements HypervisorClient {
  private readonly log: ScopedLogger;

  constructor(
    readonly hostId: string,
    private readonly config: HostConfig,
    private readonly runner: CommandRunner = defaultRunner,
  ) {
    this.log = scoped(`xen:${hostId}`);
  }

  /**
   * Connection arguments prepended to every command
   */
  connectionArgs(): string[] {
    if (isLocal(this.config.server)) {
      return ["-s", "127.0.0.1"];
    }
    return [
      "-s",
      this.config.server,
      "-u",
      this.config.username ?? "root",
      "-pw",
      this.config.password ?? "",
    ];
  }

  private async xe(args: string[]): Promise<string> {
    const fullArgs = [...this.connectionArgs(), ...args];
    this.log.debug(`Running: ${describeCommand(XE, fullArgs)}`);

    let result: CommandResult;
    try {
      result = await this.runner.run(XE, fullArgs);
    } catch (err) {
      throw new CollaboratorError(`Failed to run xe ${args[0] ?? ""}`, undefined, { cause: err });
    }

    if (!result.success) {
      throw new CollaboratorError(
        `xe ${args[0] ?? ""} failed on host ${this.hostId}: ${result.stderr || `exit code ${result.exitCode}`}`,
        result.stderr,
      );
    }
    return result.stdout;
  }

  async getVm(uuid: string): Promise<VmHandle> {
    return parseVm(await this.xe(["vm-param-list", `uuid=${uuid}`]));
  }

  private async uuidsTagged(tags: string[]): Promise<string[]> {
    const uuids = new Set<string>();
    for (const tag of new Set(tags)) {
      const output = await this.xe([
        "vm-list",
        `tags:contains=${tag}`,
        ...VM_LIST_FILTERS,
        "--minimal",
      ]);
      for (const uuid of parseUuidList(output)) {
        uuids.add(uuid);
      }
    }
    return [...uuids];
  }

  /**
   * VMs carrying any of `tags` and none of `excludeTags`
   */
  async listVms(tags: string[], excludeTags: string[]): Promise<VmHandle[]> {
    const included = await this.uuidsTagged(tags);
    const excluded = new Set<string>(
      excludeTags.length > 0 ? await this.uuidsTagged(excludeTags) : [],
    );

    const vms: VmHandle[] = [];
    for (const uuid of included) {
      if (excluded.has(uuid)) {
        this.log.debug(`Excluding VM ${uuid} by tag`);
        continue;
      }
      vms.push(await this.getVm(uuid));
    }
    return vms;
  }

  async createSnapshot(vm: VmHandle): Promise<VmHandle> {
    const label = `hyperbak-snapshot-${new Date().toISOString()}`;
    const output = await this.xe(["vm-snapshot", `vm=${vm.uuid}`, `new-name-label=${label}`]);
    const [uuid] = parseUuidList(output);
    if (!uuid) {
      throw new CollaboratorError(`xe vm-snapshot returned no uuid for VM ${vm.nameLabel}`);
    }
    this.log.debug(`Created snapshot ${uuid} of ${vm.nameLabel}`);
    return this.getVm(uuid);
  }

  async listSnapshots(vm: VmHandle): Promise<VmHandle[]> {
    const output = await this.xe(["snapshot-list", `snapshot-of=${vm.uuid}`, "--minimal"]);
    const uuids = parseUuidList(output);
    if (uuids.length === 0) {
      throw new NoSnapshotsError(vm.uuid);
    }

    const snapshots: VmHandle[] = [];
    for (const uuid of uuids) {
      snapshots.push(await this.getVm(uuid));
    }
    return snapshots;
  }

  async markNotTemplate(snapshot: VmHandle): Promise<VmHandle> {
    await this.xe(["snapshot-param-set", "is-a-template=false", `uuid=${snapshot.uuid}`]);
    return this.getVm(snapshot.uuid);
  }

  async rename(snapshot: VmHandle, label: string): Promise<VmHandle> {
    await this.xe(["snapshot-param-set", `uuid=${snapshot.uuid}`, `name-label=${label}`]);
    return this.getVm(snapshot.uuid);
  }

  async deleteSnapshot(uuid: string): Promise<void> {
    await this.xe(["snapshot-uninstall", `uuid=${uuid}`, "force=true"]);
    this.log.debug(`Deleted snapshot ${uuid}`);
  }

  /**
   * Start `xe vm-export` writing to stdout. A failed export surfaces as
   * stderr output or as an error on the stdout stream.
   */
  exportStream(snapshot: VmHandle): ExportStreams {
    const args = [...this.connectionArgs(), "vm-export", `vm=${snapshot.uuid}`, "filename="];
    this.log.debug(`Running: ${describeCommand(XE, args)}`);

    const child = this.runner.spawn(XE, args);
    child.stdin.end();

    void child.exited.then((status) => {
      if (status.error || status.exitCode === 0) return;
      if (!child.stdout.destroyed && !child.stdout.readableEnded) {
        child.stdout.destroy(
          new CollaboratorError(`xe vm-export exited with code ${status.exitCode ?? status.signal}`),
        );
      }
    });

    return { stdout: child.stdout, stderr: child.stderr };
  }
}

/**
 * One client per configured host
 */
export function createXenClients(
  hosts: Record<string, HostConfig>,
  names: string[],
  runner: CommandRunner = defaultRunner,
): XenClient[] {
  return names.map((name) => {
    const host = hosts[name];
    if (!host) {
      throw new Error(`Host "${name}" is not configured`);
    }
    return new XenClient(name, host, runner);
  });
}
