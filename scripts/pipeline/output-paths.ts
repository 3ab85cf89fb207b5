/**
 * Report file naming.
 */

import { dirname, join } from "path";

export const REPORT_EXTENSION = ".xlsx";

/** Replace characters that Windows does not allow in file names with "_". */
export function sanitizeFilename(name: string): string {
  return name.replace(/[\\/*?:"<>|]/g, "_");
}

/** Reports are written beside the document they came from. */
export function reportPath(sourcePath: string, headline: string, suffix: string): string {
  return join(
    dirname(sourcePath),
    `${sanitizeFilename(headline)}${suffix}${REPORT_EXTENSION}`,
  );
}
