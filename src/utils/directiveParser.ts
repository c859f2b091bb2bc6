export const DIRECTIVE_MARKER = "CALL_FUNCTION:";

export type DirectiveArgs = Record<string, string | null>;

export interface Directive {
  name: string;
  args: DirectiveArgs;
}

export type DirectiveParseResult =
  | { success: true; directive: Directive }
  | { success: false; reason: "absent" | "malformed" };

/**
 * Removes one layer of matching single or double quotes.
 */
function unquote(value: string): string {
  if (value.length >= 2) {
    const first = value[0];
    if ((first === '"' || first === "'") && value.endsWith(first)) {
      return value.slice(1, -1);
    }
  }
  return value;
}

function parseArgs(argString: string): DirectiveArgs {
  const args: DirectiveArgs = {};

  for (const piece of argString.split(",")) {
    const separator = piece.indexOf("=");
    if (separator === -1) continue;

    const key = piece.slice(0, separator).trim();
    const value = unquote(piece.slice(separator + 1).trim());
    args[key] = value.toLowerCase() === "none" ? null : value;
  }

  return args;
}

/**
 * Parses `CALL_FUNCTION: name(key="value", ...)` into a function name and
 * flat keyword arguments.
 *
 * The split is naive: every comma separates arguments, so a
 * quoted value cannot contain a comma, and nested parentheses are not
 * understood. Pieces without `=` are dropped. An unquoted or quoted `none`
 * (any case) becomes `null`.
 */
export function parseDirective(text: string): DirectiveParseResult {
  const markerAt = text.indexOf(DIRECTIVE_MARKER);
  if (markerAt === -1) {
    return { success: false, reason: "absent" };
  }

  try {
    const call = text.slice(markerAt + DIRECTIVE_MARKER.length).trim();
    const open = call.indexOf("(");
    if (open === -1) {
      return { success: false, reason: "malformed" };
    }
    // A missing closing parenthesis leaves the rest of the line as arguments
    const close = call.lastIndexOf(")");
    const argsEnd = close > open ? close : call.length;

    return {
      success: true,
      directive: {
        name: call.slice(0, open).trim(),
        args: parseArgs(call.slice(open + 1, argsEnd)),
      },
    };
  } catch {
    return { success: false, reason: "malformed" };
  }
}
