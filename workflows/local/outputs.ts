import { readFile } from "node:fs/promises";

const HEREDOC = /^([A-Za-z_][\w-]*)<<(.+)$/;
const ASSIGN = /^([A-Za-z_][\w-]*)=(.*)$/;

/**
 * Parse the contents of a `$GITHUB_OUTPUT` file.  Both `name=value` lines
 * and `name<<DELIMITER` blocks are accepted; later writes win.
 */
export function parseOutputs(text: string): Record<string, string> {
  const outputs: Record<string, string> = {};
  const lines = text.split(/\r?\n/);
  let i = 0;
  while (i < lines.length) {
    const line = lines[i];
    i += 1;
    if (!line.trim()) continue;

    const block = line.match(HEREDOC);
    if (block) {
      const [, name, delim] = block;
      const body: string[] = [];
      while (i < lines.length && lines[i] != delim) {
        body.push(lines[i]);
        i += 1;
      }
      if (i >= lines.length) {
        throw new Error(`unterminated output ${name}: missing ${delim}`);
      }
      i += 1;
      outputs[name] = body.join("\n");
      continue;
    }

    const assign = line.match(ASSIGN);
    if (assign) {
      outputs[assign[1]] = assign[2];
    } else {
      throw new Error(`malformed output line: ${line}`);
    }
  }
  return outputs;
}

export async function readOutputs(
  file: string,
): Promise<Record<string, string>> {
  return parseOutputs(await readFile(file, "utf8"));
}
