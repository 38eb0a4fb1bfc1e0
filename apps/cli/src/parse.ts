/**
 * Simple arg parsing helpers.
 * Supports --key=value and --flag syntax.
 */

export function parseKV(args: string[]): Record<string, string> {
  const result: Record<string, string> = {};
  for (const arg of args) {
    if (arg.startsWith("--")) {
      const eqIdx = arg.indexOf("=");
      if (eqIdx > 0) {
        result[arg.slice(2, eqIdx)] = arg.slice(eqIdx + 1);
      } else {
        result[arg.slice(2)] = "true";
      }
    }
  }
  return result;
}

export function requireArg(kv: Record<string, string>, key: string, label?: string): string {
  const val = kv[key];
  if (!val) {
    throw new Error(`Missing required argument: --${key}${label ? ` (${label})` : ""}`);
  }
  return val;
}

export function intArg(kv: Record<string, string>, key: string, defaultVal: number): number {
  const val = kv[key];
  return val ? parseInt(val, 10) : defaultVal;
}

export function strArg(kv: Record<string, string>, key: string, defaultVal: string): string {
  return kv[key] ?? defaultVal;
}

/** Comma-separated list, empty items dropped. */
export function listArg(value: string): string[] {
  return value.split(",").map((s) => s.trim()).filter((s) => s.length > 0);
}
