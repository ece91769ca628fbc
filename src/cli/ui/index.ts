/**
 * CLI UI module exports
 */

import * as output from "./output";
import * as prompts from "./prompts";

export type { SummaryItem } from "./formatters";
export {
  colorStatus,
  formatProgress,
  formatSummary,
  formatTableRow,
  formatTableSeparator,
  TABLE_WIDTHS,
} from "./formatters";
export { banner, cancel, color, error, NAME, note, outro, spinner, success, VERSION, warn } from "./output";
export { confirm, isCancel, password, select } from "./prompts";

/** Everything a command prints or asks goes through here */
export const ui = {
  banner: output.banner,
  outro: output.outro,
  cancel: output.cancel,
  note: output.note,
  success: output.success,
  warn: output.warn,
  error: output.error,
  spinner: output.spinner,
  confirm: prompts.confirm,
  select: prompts.select,
  password: prompts.password,
  isCancel: prompts.isCancel,
};
