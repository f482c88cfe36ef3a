/**
 * Path validation utilities
 */

import * as path from "node:path";

/**
 * Check if a file path is within an allowed directory.
 * Prevents path traversal attacks.
 */
export function isPathWithinDir(filePath: string, allowedDir: string): boolean {
  const normalizedPath = path.resolve(filePath);
  const normalizedDir = path.resolve(allowedDir);

  return normalizedPath.startsWith(normalizedDir + path.sep);
}
