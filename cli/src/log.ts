// SPDX-License-Identifier: Apache-2.0

/**
 * Write a message to stderr when `condition` is true, keeping stdout free
 * for command output.
 */
export function log(message: string, condition: boolean): void {
  if (condition) {
    process.stderr.write(`${message}\n`);
  }
}
