// ANSI color codes
export const colors = {
  reset: "\x1b[0m",
  red: "\x1b[31m",
  green: "\x1b[32m",
  yellow: "\x1b[33m",
  cyan: "\x1b[36m",
  dim: "\x1b[2m",
};

export type Color = Exclude<keyof typeof colors, "reset">;

/** Line sink shared by every harness component; tests pass a collector instead. */
export type Logger = (message: string, color?: Color) => void;

export function log(message: string, color?: Color): void {
  const c = color ? colors[color] : "";
  console.log(`${c}${message}${color ? colors.reset : ""}`);
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export function banner(title: string, logger: Logger = log): void {
  logger("╔════════════════════════════════════════════════════════════╗", "cyan");
  logger(`║   ${title.padEnd(57)}║`, "cyan");
  logger("╚════════════════════════════════════════════════════════════╝", "cyan");
}
