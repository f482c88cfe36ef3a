/**
 * CLI UI module exports
 */

export {
  artifactColumns,
  formatCsvRow,
  formatSummary,
  formatTableRow,
  formatTableSeparator,
  TABLE_WIDTHS,
} from "./formatters";
export { color, PRODUCT, VERSION } from "./output";

import * as output from "./output";
import * as prompts from "./prompts";

export const ui = {
  banner: output.banner,
  outro: output.outro,
  cancel: output.cancel,
  note: output.note,
  info: output.info,
  success: output.success,
  warn: output.warn,
  error: output.error,
  step: output.step,
  message: output.message,
  spinner: output.spinner,
  confirm: prompts.confirm,
  multiselect: prompts.multiselect,
  isCancel: prompts.isCancel,
};
