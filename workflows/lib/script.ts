// This file is part of LensKit.
// Copyright (C) 2018-2023 Boise State University
// Copyright (C) 2023-2025 Drexel University
// Licensed under the MIT license, see LICENSE.md for details.
// SPDX-License-Identifier: MIT

import assert from "node:assert/strict";

/**
 * Assemble a shell script from template strings.  Each argument is dedented
 * by the indentation of its first non-blank line, so scripts can be written
 * inline at the nesting level of the surrounding code.
 */
export function script(...chunks: string[]): string {
  let out = "";
  for (const chunk of chunks) {
    // drop blank lines before the first command
    const body = chunk.replace(/^(\s*?\n)+/, "");
    const m = body.match(/^ */);
    assert(m != null);
    const indent = m[0].length;
    const lines = indent
      ? body.replaceAll(new RegExp(`^ {${indent}}`, "gm"), "")
      : body;
    out += lines.trimEnd() + "\n";
  }
  return out;
}

/**
 * Split a script into its non-empty command lines.
 */
export function scriptLines(text: string): string[] {
  return text.split("\n").map((l) => l.trim()).filter((l) => l.length > 0);
}
