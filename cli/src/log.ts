// SPDX-License-Identifier: Apache-2.0

export type Log = (message: string) => void;

/**
 * Progress logger bound to `--verbose`. Progress and reports go to stderr;
 * stdout carries only the landing table or JSON.
 */
export function createLog(verbose: boolean, write: (text: string) => void = (text) => process.stderr.write(text)): Log {
  return (message) => {
    if (verbose) write(`${message}\n`);
  };
}
