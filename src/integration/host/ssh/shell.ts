// SPDX-License-Identifier: Apache-2.0

/** Quotes a value as a single POSIX shell word */
export function quote(value: string): string {
  if (/^[\w./:=@%+-]+$/.test(value)) {
    return value;
  }
  return `'${value.replaceAll("'", `'\\''`)}'`;
}
