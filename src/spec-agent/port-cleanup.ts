/**
 * Drops repeated port declarations from generated Verilog.
 *
 * Models occasionally declare a port twice (once in an ANSI header list and
 * again in the body, or twice in the body). A declaration line whose signals
 * were all declared earlier is removed; other lines pass through untouched.
 */

const DECLARATION_LINE = /^\s*(input|output|inout)\b/;
const NON_SIGNAL_TOKENS = new Set(["input", "output", "inout", "wire", "reg", "logic", "signed", "unsigned"]);

function declaredSignals(line: string): string[] {
  return line
    .replace(/\/\/.*$/, "")
    .replace(/\[[^\]]*\]/g, " ")
    .replace(/[;,]/g, " ")
    .split(/\s+/)
    .filter((token) => token.length > 0 && !NON_SIGNAL_TOKENS.has(token));
}

export function dedupePortDeclarations(verilog: string): string {
  const seen = new Set<string>();
  const kept: string[] = [];

  for (const line of verilog.split(/\r?\n/)) {
    if (DECLARATION_LINE.test(line)) {
      const signals = declaredSignals(line);
      if (signals.length > 0 && signals.every((signal) => seen.has(signal))) {
        continue;
      }
      for (const signal of signals) {
        seen.add(signal);
      }
    }
    kept.push(line);
  }

  return kept.join("\n");
}
