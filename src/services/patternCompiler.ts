import { ConfigError, errorMessage } from "../types/errors.js";

const INLINE_FLAGS = /^\s*\(\?([aiLmsux]+)\)/;

/**
 * Drop unescaped whitespace and `#` comments outside character classes,
 * the way verbose-mode patterns are written in the rule files.
 */
export function stripVerbose(source: string): string {
  let out = "";
  let inClass = false;
  let i = 0;

  while (i < source.length) {
    const ch = source[i];

    if (ch === "\\") {
      out += source.slice(i, i + 2);
      i += 2;
      continue;
    }

    if (inClass) {
      if (ch === "]") inClass = false;
      out += ch;
      i++;
      continue;
    }

    if (ch === "[") {
      inClass = true;
      out += ch;
      i++;
      // A leading "]" (or "^]") is a literal member, not the end of the class
      if (source[i] === "^") {
        out += "^";
        i++;
      }
      if (source[i] === "]") {
        out += "\\]";
        i++;
      }
      continue;
    }

    if (ch === "#") {
      while (i < source.length && source[i] !== "\n") i++;
      continue;
    }

    if (/\s/.test(ch)) {
      i++;
      continue;
    }

    out += ch;
    i++;
  }

  return out;
}

export function compilePattern(source: string): RegExp {
  let body = source;
  const flags = new Set<string>(["g"]);
  let verbose = false;

  const inline = INLINE_FLAGS.exec(body);
  if (inline) {
    body = body.slice(inline[0].length);
    for (const flag of inline[1]) {
      if (flag === "x") verbose = true;
      else if (flag === "i" || flag === "m" || flag === "s") flags.add(flag);
    }
  }

  if (verbose) body = stripVerbose(body);

  body = body.replace(/\(\?P<(\w+)>/g, "(?<$1>").replace(/\(\?P=(\w+)\)/g, "\\k<$1>");

  try {
    return new RegExp(body, [...flags].join(""));
  } catch (error) {
    throw new ConfigError(`Invalid pattern: ${errorMessage(error)}`, { cause: error });
  }
}

export function countCaptureGroups(pattern: RegExp): number {
  // An alternation with the empty string always matches, exposing every group slot
  const probe = new RegExp(`${pattern.source}|`);
  const match = probe.exec("");
  return match ? match.length - 1 : 0;
}
