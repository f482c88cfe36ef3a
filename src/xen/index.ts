/**
 * Xen hypervisor exports
 */

export { createXenClients, XenClient } from "./client";
export { parseParamList, parseUuidList, parseVm, parseXenTimestamp } from "./parser";
