/**
 * Interactive prompts wrapper
 */

import * as p from "@clack/prompts";

export const confirm = p.confirm;
export const multiselect = p.multiselect;
export const isCancel = p.isCancel;
